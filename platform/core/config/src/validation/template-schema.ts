import fs from "fs/promises";
import { z } from "zod";
import { Mapping, Path, toJsonText, TypeMismatchError, type Value } from "@bundlekit/dyn";
import { loadYamlFile } from "../loader/yaml-loader";
import { PROPERTY_TYPES, type PropertyType } from "../schema/schema-node";
import {
  castToInteger,
  createTypeValidators,
  type TypeValidators,
} from "./type-validators";
import {
  InvalidSchemaFileError,
  MissingKeyError,
  UndeclaredKeyError,
} from "./validation-errors";

const TEMPLATE_PROPERTY_SCHEMA = z
  .object({
    type: z.enum(PROPERTY_TYPES),
    description: z.string().optional(),
  })
  .loose();

const TEMPLATE_SCHEMA_FILE = z
  .object({
    properties: z.record(z.string(), TEMPLATE_PROPERTY_SCHEMA).default({}),
  })
  .loose();

export interface TemplateProperty {
  type: PropertyType;
  description?: string;
}

/**
 * Strict schema for a template's input parameters: every key must be
 * declared, every declared key must be present, and every value must have
 * its declared type.
 */
export class TemplateSchema {
  private readonly validators: TypeValidators;

  constructor(
    readonly properties: Readonly<Record<string, TemplateProperty>>,
    validators?: TypeValidators,
  ) {
    this.validators = validators ?? createTypeValidators();
  }

  static async read(file: string, validators?: TypeValidators): Promise<TemplateSchema> {
    const source = await fs.readFile(file, "utf-8");

    let parsed: unknown;
    try {
      parsed = JSON.parse(source);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new InvalidSchemaFileError(file, detail);
    }

    const result = TEMPLATE_SCHEMA_FILE.safeParse(parsed);
    if (!result.success) {
      throw new InvalidSchemaFileError(file, z.prettifyError(result.error));
    }

    return new TemplateSchema(result.data.properties, validators);
  }

  /**
   * Loads an input file, recovers integers and validates it.
   */
  async readConfig(file: string): Promise<Value> {
    const config = this.castFloatToInt(await loadYamlFile(file));
    this.validateConfig(config);
    return config;
  }

  castFloatToInt(config: Value): Value {
    const mapping = config.asMapping();
    const pairs = mapping.pairs().map((pair) => {
      const property = this.property(pair.key);
      if (property?.type !== "integer") {
        return pair;
      }
      return { ...pair, value: castToInteger(pair.value, pair.key) };
    });
    return config.withMapping(new Mapping(pairs));
  }

  validateConfig(config: Value): void {
    const mapping = config.asMapping();

    for (const key of mapping.keys()) {
      if (!this.property(key)) {
        throw new UndeclaredKeyError(key);
      }
    }

    for (const key of Object.keys(this.properties)) {
      if (!mapping.has(key)) {
        throw new MissingKeyError(key);
      }
    }

    for (const pair of mapping.pairs()) {
      const property = this.property(pair.key);
      if (!property || this.validators[property.type].matches(pair.value)) {
        continue;
      }

      throw new TypeMismatchError(property.type, pair.value.kind, {
        path: Path.of(Path.key(pair.key)),
        message: `incorrect type for ${pair.key}. expected type ${property.type}, but value is ${toJsonText(pair.value)}`,
      });
    }
  }

  private property(key: string): TemplateProperty | undefined {
    return Object.hasOwn(this.properties, key) ? this.properties[key] : undefined;
  }
}
