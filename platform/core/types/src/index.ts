export * from "./config";
export * from "./mutators";
