import {
  any,
  array,
  boolean,
  integer,
  map,
  object,
  string,
  type ObjectSchema,
} from "./schema-node";

const permissions = array(
  object({
    level: string(),
    user_name: string(),
    group_name: string(),
    service_principal_name: string(),
  }),
);

const keyValueTags = array(object({ key: string(), value: string() }));

const task = object({
  task_key: string("Unique key of the task within its job."),
  description: string(),
  depends_on: array(object({ task_key: string(), outcome: string() })),
  existing_cluster_id: string(),
  job_cluster_key: string(),
  new_cluster: any(),
  notebook_task: object({
    notebook_path: string(),
    base_parameters: map(string()),
    source: string(),
  }),
  spark_python_task: object({
    python_file: string(),
    parameters: array(string()),
  }),
  python_wheel_task: object({
    package_name: string(),
    entry_point: string(),
    parameters: array(string()),
    named_parameters: map(string()),
  }),
  pipeline_task: object({
    pipeline_id: string(),
    full_refresh: boolean(),
  }),
  libraries: array(any()),
  max_retries: integer(),
  min_retry_interval_millis: integer(),
  retry_on_timeout: boolean(),
  timeout_seconds: integer(),
});

const job = object({
  name: string("Display name of the job."),
  description: string(),
  max_concurrent_runs: integer(),
  timeout_seconds: integer(),
  tags: map(string()),
  tasks: array(task),
  job_clusters: array(object({ job_cluster_key: string(), new_cluster: any() })),
  parameters: array(object({ name: string(), default: string() })),
  schedule: object({
    quartz_cron_expression: string(),
    timezone_id: string(),
    pause_status: string(),
  }),
  email_notifications: any(),
  webhook_notifications: any(),
  permissions,
});

const pipeline = object({
  name: string(),
  catalog: string(),
  target: string(),
  development: boolean(),
  continuous: boolean(),
  photon: boolean(),
  channel: string(),
  configuration: map(string()),
  clusters: array(any()),
  libraries: array(any()),
  permissions,
});

const model = object({
  name: string(),
  description: string(),
  tags: keyValueTags,
  permissions,
});

const experiment = object({
  name: string(),
  artifact_location: string(),
  tags: keyValueTags,
  permissions,
});

const modelServingEndpoint = object({
  name: string(),
  config: any(),
  route_optimized: boolean(),
  tags: keyValueTags,
  permissions,
});

const registeredModel = object({
  name: string(),
  catalog_name: string(),
  schema_name: string(),
  comment: string(),
  storage_location: string(),
  grants: array(any()),
});

const qualityMonitor = object({
  table_name: string(),
  assets_dir: string(),
  output_schema_name: string(),
  baseline_table_name: string(),
  schedule: any(),
  snapshot: any(),
  time_series: any(),
  inference_log: any(),
});

const schema = object({
  name: string(),
  catalog_name: string(),
  comment: string(),
  storage_root: string(),
  properties: map(string()),
  grants: array(any()),
});

export const RESOURCES_SCHEMA = object({
  jobs: map(job),
  pipelines: map(pipeline),
  models: map(model),
  experiments: map(experiment),
  model_serving_endpoints: map(modelServingEndpoint),
  registered_models: map(registeredModel),
  quality_monitors: map(qualityMonitor),
  schemas: map(schema),
});

const workspace = object({
  host: string(),
  profile: string(),
  root_path: string(),
  file_path: string(),
  artifact_path: string(),
  state_path: string(),
});

const variable = object({
  description: string(),
  default: any(),
  lookup: map(string()),
});

const target = object({
  default: boolean(),
  mode: string(),
  bundle: any(),
  workspace,
  variables: map(any()),
  resources: RESOURCES_SCHEMA,
  run_as: object({ user_name: string(), service_principal_name: string() }),
  permissions,
});

export const PLUGINS_SCHEMA = object({
  enabled: boolean("Run the configured plugin module during load and init."),
  venv_path: string("Virtual environment that holds the plugin interpreter."),
  module: string("Module executed with `-m` by the plugin interpreter."),
});

/**
 * Schema of a complete bundle document, as written by people in
 * `bundle.yml` and its includes, and as returned by plugins.
 */
export const BUNDLE_SCHEMA: ObjectSchema = object({
  bundle: object({
    name: string(),
    compute_id: string(),
    git: object({ origin_url: string(), branch: string() }),
  }),
  include: array(string("Glob pattern, relative to the bundle root.")),
  experimental: object({
    python_wheel_wrapper: boolean(),
    plugins: PLUGINS_SCHEMA,
  }),
  variables: map(variable),
  workspace,
  resources: RESOURCES_SCHEMA,
  targets: map(target),
  sync: object({ include: array(string()), exclude: array(string()) }),
  permissions,
  run_as: object({ user_name: string(), service_principal_name: string() }),
});
