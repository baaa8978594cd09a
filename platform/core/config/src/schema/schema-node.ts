export const PROPERTY_TYPES = ["string", "integer", "number", "boolean"] as const;

export type PropertyType = (typeof PROPERTY_TYPES)[number];

export interface ScalarSchema {
  readonly type: PropertyType;
  readonly description?: string;
}

export interface AnySchema {
  readonly type: "any";
  readonly description?: string;
}

export interface ObjectSchema {
  readonly type: "object";
  readonly properties: Readonly<Record<string, SchemaNode>>;
  readonly description?: string;
}

/** Mapping with arbitrary keys whose values share one schema. */
export interface MapSchema {
  readonly type: "map";
  readonly values: SchemaNode;
  readonly description?: string;
}

export interface ArraySchema {
  readonly type: "array";
  readonly items: SchemaNode;
  readonly description?: string;
}

export type SchemaNode =
  | ScalarSchema
  | AnySchema
  | ObjectSchema
  | MapSchema
  | ArraySchema;

export const string = (description?: string): ScalarSchema => ({ type: "string", description });
export const integer = (description?: string): ScalarSchema => ({ type: "integer", description });
export const number = (description?: string): ScalarSchema => ({ type: "number", description });
export const boolean = (description?: string): ScalarSchema => ({ type: "boolean", description });
export const any = (description?: string): AnySchema => ({ type: "any", description });

export function object(properties: Record<string, SchemaNode>, description?: string): ObjectSchema {
  return { type: "object", properties, description };
}

export function map(values: SchemaNode, description?: string): MapSchema {
  return { type: "map", values, description };
}

export function array(items: SchemaNode, description?: string): ArraySchema {
  return { type: "array", items, description };
}

export function isScalarSchema(node: SchemaNode): node is ScalarSchema {
  return PROPERTY_TYPES.some((type) => type === node.type);
}
