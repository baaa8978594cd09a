import path from "path";
import type { Logger } from "pino";
import {
  AmendPolicy,
  AppendOnlyPolicy,
  override,
  Path,
  toJsonText,
  type NamedOverridePolicy,
  type PolicyLogger,
  type Value,
} from "@bundlekit/dyn";
import { BUNDLE_SCHEMA, loadYaml, type BundleStore, type Normalizer } from "@bundlekit/config";
import type { MutationRunOptions, PluginPhase, PluginSettings } from "@bundlekit/types";
import type { ChannelFactory } from "./channels";
import { PluginOutputError } from "./errors";
import { ensureInterpreter, interpreterPath } from "./interpreter";
import { readPluginSettings } from "./plugin-settings";
import type { ProcessRunner } from "./process-runner";

/** File name recorded as the source of everything a plugin produces. */
export const GENERATED_FILE_NAME = "__generated__.yml";

export const MUTABLE_RESOURCES_PATH = Path.parse("resources.jobs");

/**
 * A step that replaces the bundle document through the store.
 */
export interface BundleMutator {
  readonly name: string;
  apply(store: BundleStore, options?: MutationRunOptions): Promise<void>;
}

export interface PluginMutatorContext {
  /** Used when the store does not know where its document was loaded from. */
  projectRoot?: string;
  normalizer: Normalizer;
  runner: ProcessRunner;
  channels: ChannelFactory;
  logger: Logger;
  platform?: NodeJS.Platform;
}

/**
 * Plugins may only add jobs while loading; once initialised they may amend
 * jobs but never remove one.
 */
export function createPhasePolicy(
  phase: PluginPhase,
  logger?: PolicyLogger,
): NamedOverridePolicy {
  switch (phase) {
    case "load":
      return new AppendOnlyPolicy(MUTABLE_RESOURCES_PATH, logger);
    case "init":
      return new AmendPolicy(MUTABLE_RESOURCES_PATH, logger);
  }
}

export class PluginMutator implements BundleMutator {
  readonly name: string;

  constructor(
    readonly phase: PluginPhase,
    private readonly context: PluginMutatorContext,
  ) {
    this.name = `PluginMutator(${phase})`;
  }

  async apply(store: BundleStore, options: MutationRunOptions = {}): Promise<void> {
    const { logger } = this.context;

    await store.mutate(async (current) => {
      const settings = readPluginSettings(current);
      if (!settings.enabled) {
        logger.debug({ mutator: this.name }, "Plugins are disabled");
        return current;
      }

      const projectRoot =
        store.getProjectRoot() ?? this.context.projectRoot ?? process.cwd();
      const generated = await this.invoke(projectRoot, settings, current, options.signal);
      const normalized = this.normalizeOutput(generated);
      return override(current, normalized, createPhasePolicy(this.phase, logger));
    });
  }

  private async invoke(
    projectRoot: string,
    settings: PluginSettings,
    current: Value,
    signal?: AbortSignal,
  ): Promise<Value> {
    const { runner, channels, logger } = this.context;
    const venvPath = settings.venvPath ?? "";
    const interpreter = await ensureInterpreter(
      path.resolve(projectRoot, interpreterPath(venvPath, this.context.platform)),
    );

    const pair = await channels.open();
    try {
      await pair.input.write(toJsonText(current));

      const args = [
        "-m",
        settings.module,
        "--phase",
        this.phase,
        "--input",
        pair.input.name,
        "--output",
        pair.output.name,
      ];
      logger.debug({ interpreter, args }, `Running ${this.name}`);

      await runner.run(interpreter, args, {
        cwd: projectRoot,
        signal,
        onLine: (stream, line) => logger.debug(`${stream}: ${line}`),
      });

      const text = await pair.output.read();
      return this.loadOutput(projectRoot, text);
    } finally {
      await pair.dispose();
    }
  }

  private loadOutput(projectRoot: string, text: string): Value {
    const virtualPath = path.join(projectRoot, GENERATED_FILE_NAME);
    try {
      return loadYaml(virtualPath, text);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new PluginOutputError(`failed to load plugin output: ${detail}`, [], {
        cause: error,
      });
    }
  }

  private normalizeOutput(generated: Value): Value {
    const { value, diagnostics } = this.context.normalizer.normalize(
      BUNDLE_SCHEMA,
      generated,
    );

    const [first] = diagnostics;
    if (first) {
      throw new PluginOutputError(
        `failed to normalize plugin output: ${first.summary}`,
        diagnostics,
      );
    }

    return value;
  }
}

export function createPluginMutators(
  context: PluginMutatorContext,
  phases: readonly PluginPhase[],
): PluginMutator[] {
  return phases.map((phase) => new PluginMutator(phase, context));
}
