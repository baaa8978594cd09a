import fs from "fs/promises";
import path from "path";
import fg from "fast-glob";
import { Inject, Injectable, Logger, Optional } from "@nestjs/common";
import {
  filterDiagnostics,
  formatLocation,
  merge,
  type Value,
} from "@bundlekit/dyn";
import type { RuntimeOptions } from "@bundlekit/types";
import { RUNTIME_OPTIONS_TOKEN } from "./config.const";
import { BundleStore } from "./bundle.store";
import {
  detectResourceConflicts,
  type BundleFile,
} from "./conflicts/resource-conflicts";
import { loadYamlFile } from "./loader/yaml-loader";
import { BUNDLE_SCHEMA } from "./schema/bundle.schema";
import { Normalizer } from "./validation/normalizer";
import { SchemaValidationError } from "./validation/validation-errors";

export const ROOT_FILE_NAMES = ["bundle.yml", "bundle.yaml"] as const;

export class BundleLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BundleLoadError";
  }
}

export interface LoadedBundle {
  root: string;
  rootFile: string;
  /** Root file first, then included files in include order. */
  files: string[];
  value: Value;
}

@Injectable()
export class BundleLoaderService {
  private readonly logger = new Logger(BundleLoaderService.name);

  private readonly options: RuntimeOptions;

  constructor(
    @Inject(Normalizer) private readonly normalizer: Normalizer,
    @Inject(BundleStore) private readonly store: BundleStore,
    @Optional()
    @Inject(RUNTIME_OPTIONS_TOKEN)
    options?: RuntimeOptions,
  ) {
    this.options = options ?? {};
  }

  /**
   * Loads the bundle rooted at `projectRoot`, checks resource names across
   * all of its files, merges them and seeds the store with the result.
   */
  async load(projectRoot?: string): Promise<LoadedBundle> {
    const root = path.resolve(projectRoot ?? this.options.projectRoot ?? process.cwd());
    const rootFile = await this.findRootFile(root);
    const rootValue = await this.loadFile(rootFile);

    const files: BundleFile[] = [{ path: rootFile, value: rootValue }];
    for (const includePath of await this.expandIncludes(root, rootFile, rootValue)) {
      const value = await this.loadFile(includePath);
      if (value.kind === "mapping" && value.asMapping().has("include")) {
        throw new BundleLoadError(
          `${includePath}: include section is only allowed in the root configuration file`,
        );
      }
      files.push({ path: includePath, value });
    }

    detectResourceConflicts(files);

    const value = files
      .slice(1)
      .reduce((merged, file) => merge(merged, file.value), rootValue);

    this.store.setSnapshot(value);
    this.store.setProjectRoot(root);
    this.logger.debug(`Loaded bundle from ${files.length} file(s) in ${root}`);

    return {
      root,
      rootFile,
      files: files.map((file) => file.path),
      value,
    };
  }

  private async findRootFile(root: string): Promise<string> {
    const found: string[] = [];
    for (const name of ROOT_FILE_NAMES) {
      const candidate = path.join(root, name);
      try {
        const stats = await fs.stat(candidate);
        if (stats.isFile()) {
          found.push(candidate);
        }
      } catch (error) {
        if (!isMissingFileError(error)) {
          throw error;
        }
      }
    }

    if (found.length === 0) {
      throw new BundleLoadError(
        `unable to locate bundle root: ${ROOT_FILE_NAMES.join(" or ")} not found in ${root}`,
      );
    }

    if (found.length > 1) {
      throw new BundleLoadError(
        `multiple bundle root configuration files found in ${root}`,
      );
    }

    return found[0];
  }

  private async loadFile(file: string): Promise<Value> {
    const loaded = await loadYamlFile(file);
    const { value, diagnostics } = this.normalizer.normalize(BUNDLE_SCHEMA, loaded);

    for (const warning of filterDiagnostics(diagnostics, "warning")) {
      this.logger.warn(`${formatLocation(warning.location)}: ${warning.summary}`);
    }

    const errors = filterDiagnostics(diagnostics, "error");
    if (errors.length > 0) {
      throw new SchemaValidationError(errors);
    }

    return value;
  }

  private async expandIncludes(
    root: string,
    rootFile: string,
    rootValue: Value,
  ): Promise<string[]> {
    const include = rootValue.kind === "mapping" ? rootValue.get("include") : undefined;
    if (include?.kind !== "sequence") {
      return [];
    }

    const seen = new Set<string>([rootFile]);
    const files: string[] = [];

    for (const entry of include.asSequence()) {
      if (entry.kind !== "string") {
        continue;
      }

      const pattern = entry.asString();
      const matches = await fg(pattern, { cwd: root, onlyFiles: true, absolute: true });
      if (matches.length === 0) {
        throw new BundleLoadError(
          `${pattern} defined in 'include' section does not match any files`,
        );
      }

      for (const match of matches.map((file) => path.normalize(file)).sort()) {
        if (!seen.has(match)) {
          seen.add(match);
          files.push(match);
        }
      }
    }

    return files;
  }
}

function isMissingFileError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
