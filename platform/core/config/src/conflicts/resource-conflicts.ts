import { formatLocation, type Location, type Value } from "@bundlekit/dyn";

/**
 * Resource sections of a bundle document and the kind name each one
 * declares. Scan order within a file follows this table.
 */
export const RESOURCE_KINDS = {
  jobs: "job",
  pipelines: "pipeline",
  models: "model",
  experiments: "experiment",
  model_serving_endpoints: "model_serving_endpoint",
  registered_models: "registered_model",
  quality_monitors: "quality_monitor",
  schemas: "schema",
} as const;

export type ResourceSection = keyof typeof RESOURCE_KINDS;
export type ResourceKind = (typeof RESOURCE_KINDS)[ResourceSection];

export interface BundleFile {
  readonly path: string;
  readonly value: Value;
}

export interface ResourceOccurrence {
  readonly kind: ResourceKind;
  readonly location: Location;
}

export class ConflictError extends Error {
  constructor(
    readonly resourceName: string,
    readonly occurrences: readonly ResourceOccurrence[],
  ) {
    const listed = occurrences
      .map((occurrence) => `${occurrence.kind} at ${formatLocation(occurrence.location)}`)
      .join(", ");
    super(`multiple resources named ${resourceName} (${listed})`);
    this.name = "ConflictError";
  }
}

/**
 * Indexes every declared resource name across `files`, in scan order.
 */
export function buildResourceIndex(
  files: readonly BundleFile[],
): Map<string, ResourceOccurrence[]> {
  const index = new Map<string, ResourceOccurrence[]>();

  for (const file of files) {
    const resources = file.value.kind === "mapping" ? file.value.get("resources") : undefined;
    if (resources?.kind !== "mapping") {
      continue;
    }

    for (const [section, kind] of Object.entries(RESOURCE_KINDS)) {
      const declared = resources.get(section);
      if (declared?.kind !== "mapping") {
        continue;
      }

      for (const pair of declared.asMapping().pairs()) {
        const occurrences = index.get(pair.key) ?? [];
        occurrences.push({ kind, location: pair.value.location });
        index.set(pair.key, occurrences);
      }
    }
  }

  return index;
}

/**
 * Throws `ConflictError` for the first resource name declared more than
 * once, whatever its kinds. Names are compared case-sensitively.
 */
export function detectResourceConflicts(files: readonly BundleFile[]): void {
  for (const [name, occurrences] of buildResourceIndex(files)) {
    if (occurrences.length > 1) {
      throw new ConflictError(name, occurrences);
    }
  }
}
