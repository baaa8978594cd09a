export * from "./diagnostics";
export * from "./errors";
export * from "./json";
export * from "./location";
export * from "./merge";
export * from "./override";
export * from "./override-policies";
export * from "./path";
export * from "./value";
export * from "./visit";
