import { Inject, Injectable, Optional } from "@nestjs/common";
import {
  Mapping,
  Path,
  TypeMismatchError,
  Value,
  type Diagnostic,
  type Kind,
  type MappingPair,
} from "@bundlekit/dyn";
import { TYPE_VALIDATORS_TOKEN } from "../config.const";
import { isScalarSchema, type SchemaNode } from "../schema/schema-node";
import { createTypeValidators, type TypeValidators } from "./type-validators";
import { NotAnIntegerError } from "./validation-errors";

export interface NormalizeResult {
  value: Value;
  diagnostics: Diagnostic[];
}

/**
 * Permissive normalization of a value tree against a document schema.
 * Unknown fields are reported as warnings and dropped; nodes of the wrong
 * type are reported as errors and dropped. Nil is accepted everywhere.
 */
@Injectable()
export class Normalizer {
  private readonly validators: TypeValidators;

  constructor(
    @Optional()
    @Inject(TYPE_VALIDATORS_TOKEN)
    validators?: TypeValidators,
  ) {
    this.validators = validators ?? createTypeValidators();
  }

  normalize(schema: SchemaNode, value: Value): NormalizeResult {
    const diagnostics: Diagnostic[] = [];
    const normalized = this.normalizeNode(schema, value, Path.root, diagnostics);
    return {
      value: normalized ?? Value.nil(value.location),
      diagnostics,
    };
  }

  private normalizeNode(
    schema: SchemaNode,
    value: Value,
    path: Path,
    diagnostics: Diagnostic[],
  ): Value | undefined {
    if (value.isNil() || schema.type === "any") {
      return value;
    }

    if (isScalarSchema(schema)) {
      return this.normalizeScalar(schema.type, value, path, diagnostics);
    }

    switch (schema.type) {
      case "object": {
        if (!this.expectKind("mapping", value, path, diagnostics)) {
          return undefined;
        }
        const pairs: MappingPair[] = [];
        for (const pair of value.asMapping().pairs()) {
          const childPath = path.key(pair.key);
          if (!Object.hasOwn(schema.properties, pair.key)) {
            diagnostics.push({
              severity: "warning",
              summary: `unknown field: ${pair.key}`,
              path: childPath,
              location: pair.keyLocation,
            });
            continue;
          }
          const child = this.normalizeNode(
            schema.properties[pair.key],
            pair.value,
            childPath,
            diagnostics,
          );
          if (child) {
            pairs.push({ ...pair, value: child });
          }
        }
        return value.withMapping(new Mapping(pairs));
      }
      case "map": {
        if (!this.expectKind("mapping", value, path, diagnostics)) {
          return undefined;
        }
        const pairs: MappingPair[] = [];
        for (const pair of value.asMapping().pairs()) {
          const child = this.normalizeNode(
            schema.values,
            pair.value,
            path.key(pair.key),
            diagnostics,
          );
          if (child) {
            pairs.push({ ...pair, value: child });
          }
        }
        return value.withMapping(new Mapping(pairs));
      }
      case "array": {
        if (!this.expectKind("sequence", value, path, diagnostics)) {
          return undefined;
        }
        const items: Value[] = [];
        value.asSequence().forEach((item, position) => {
          const child = this.normalizeNode(
            schema.items,
            item,
            path.index(position),
            diagnostics,
          );
          if (child) {
            items.push(child);
          }
        });
        return value.withSequence(items);
      }
    }
  }

  private normalizeScalar(
    type: keyof TypeValidators,
    value: Value,
    path: Path,
    diagnostics: Diagnostic[],
  ): Value | undefined {
    try {
      return this.validators[type].coerce(value, path);
    } catch (error) {
      if (error instanceof TypeMismatchError || error instanceof NotAnIntegerError) {
        diagnostics.push({
          severity: "error",
          summary: error.message,
          path,
          location: value.location,
          error,
        });
        return undefined;
      }
      throw error;
    }
  }

  private expectKind(
    expected: Kind,
    value: Value,
    path: Path,
    diagnostics: Diagnostic[],
  ): boolean {
    if (value.kind === expected) {
      return true;
    }

    const error = new TypeMismatchError(expected, value.kind, { path });
    diagnostics.push({
      severity: "error",
      summary: error.message,
      path,
      location: value.location,
      error,
    });
    return false;
  }
}
