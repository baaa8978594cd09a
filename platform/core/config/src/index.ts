import "reflect-metadata";

export * from "./bundle-loader.service";
export * from "./bundle.store";
export * from "./config.const";
export * from "./config.module";
export * from "./config.namespace";
export * from "./conflicts/resource-conflicts";
export * from "./loader/parse-error";
export * from "./loader/yaml-loader";
export * from "./runtime-env";
export * as schema from "./schema/schema-node";
export { PROPERTY_TYPES, isScalarSchema } from "./schema/schema-node";
export type {
  AnySchema,
  ArraySchema,
  MapSchema,
  ObjectSchema,
  PropertyType,
  ScalarSchema,
  SchemaNode,
} from "./schema/schema-node";
export * from "./schema/bundle.schema";
export * from "./validation/normalizer";
export * from "./validation/template-schema";
export * from "./validation/type-validators";
export * from "./validation/validation-errors";
