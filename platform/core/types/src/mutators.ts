export type PluginPhase = "load" | "init";

/** Phases in the order the pipeline runs them. */
export const PLUGIN_PHASES: readonly PluginPhase[] = ["load", "init"];

export interface PluginSettings {
  enabled: boolean;
  venvPath?: string;
  module: string;
}

export interface MutationRunOptions {
  signal?: AbortSignal;
}
