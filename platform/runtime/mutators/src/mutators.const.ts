export const MUTATORS_LOGGER_SCOPE = "mutators";

/** Provides the `ProcessRunner` that launches plugin processes. */
export const PROCESS_RUNNER_TOKEN = Symbol("BUNDLEKIT_PROCESS_RUNNER");

/** Provides the `ChannelFactory` for plugin interchange files. */
export const CHANNEL_FACTORY_TOKEN = Symbol("BUNDLEKIT_CHANNEL_FACTORY");

/** Provides the ordered list of `BundleMutator`s the pipeline runs. */
export const BUNDLE_MUTATORS_TOKEN = Symbol("BUNDLEKIT_BUNDLE_MUTATORS");
