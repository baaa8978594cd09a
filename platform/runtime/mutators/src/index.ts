import "reflect-metadata";

export * from "./cache-dir";
export * from "./channels";
export * from "./errors";
export * from "./interpreter";
export * from "./mutation-pipeline.service";
export * from "./mutators.const";
export * from "./mutators.module";
export * from "./plugin-mutator";
export * from "./plugin-settings";
export * from "./process-runner";
