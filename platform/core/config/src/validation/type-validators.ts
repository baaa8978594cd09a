import { isInt64, TypeMismatchError, Value, type Kind, type Path } from "@bundlekit/dyn";
import type { PropertyType } from "../schema/schema-node";
import { NotAnIntegerError } from "./validation-errors";

const DECIMAL_INTEGER = /^[-+]?\d+$/;

const VARIABLE_REFERENCE =
  /^\$\{[A-Za-z][\w-]*(\[\d+\])*(\.[A-Za-z][\w-]*(\[\d+\])*)*\}$/;

export function isVariableReference(text: string): boolean {
  return VARIABLE_REFERENCE.test(text);
}

export interface TypeValidator {
  readonly type: PropertyType;
  /** Value kind a normalized value of this type has. */
  readonly kind: Kind;
  /**
   * Exact check used by strict validation. `number` accepts both ints and
   * floats.
   */
  matches(value: Value): boolean;
  /**
   * Lossless conversion used by permissive normalization. Throws
   * `TypeMismatchError` when no conversion exists.
   */
  coerce(value: Value, path: Path): Value;
}

export type TypeValidators = Readonly<Record<PropertyType, TypeValidator>>;

/**
 * Converts a float to an int when it has no fractional part and fits in
 * 64 bits.
 */
export function castToInteger(value: Value, key: string): Value {
  if (value.kind !== "float") {
    return value;
  }

  const number = value.asFloat();
  if (!Number.isInteger(number) || !isInt64(BigInt(number))) {
    throw new NotAnIntegerError(key, number);
  }

  return Value.int(BigInt(number), value.location);
}

function parseInteger(text: string, key: string): bigint {
  const parsed = BigInt(text.trim());
  if (!isInt64(parsed)) {
    throw new NotAnIntegerError(key, text.trim());
  }
  return parsed;
}

function parseNumeric(text: string): number | undefined {
  if (text.trim() === "") {
    return undefined;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function mismatch(expected: Kind, value: Value, path: Path): TypeMismatchError {
  return new TypeMismatchError(expected, value.kind, { path });
}

const stringValidator: TypeValidator = {
  type: "string",
  kind: "string",
  matches: (value) => value.kind === "string",
  coerce(value, path) {
    switch (value.kind) {
      case "string":
        return value;
      case "int":
        return Value.string(String(value.asInt()), value.location);
      case "float":
        return Value.string(String(value.asFloat()), value.location);
      case "bool":
        return Value.string(String(value.asBool()), value.location);
      default:
        throw mismatch("string", value, path);
    }
  },
};

const booleanValidator: TypeValidator = {
  type: "boolean",
  kind: "bool",
  matches: (value) => value.kind === "bool",
  coerce(value, path) {
    if (value.kind === "bool") {
      return value;
    }

    if (value.kind === "string") {
      const text = value.asString();
      if (isVariableReference(text)) {
        return value;
      }
      if (text === "true" || text === "false") {
        return Value.bool(text === "true", value.location);
      }
    }

    throw mismatch("bool", value, path);
  },
};

const integerValidator: TypeValidator = {
  type: "integer",
  kind: "int",
  matches: (value) => value.kind === "int",
  coerce(value, path) {
    switch (value.kind) {
      case "int":
        return value;
      case "float":
        return castToInteger(value, path.toString());
      case "string": {
        const text = value.asString();
        if (isVariableReference(text)) {
          return value;
        }
        if (DECIMAL_INTEGER.test(text.trim())) {
          return Value.int(parseInteger(text, path.toString()), value.location);
        }
        const parsed = parseNumeric(text);
        if (parsed !== undefined) {
          return castToInteger(Value.float(parsed, value.location), path.toString());
        }
        throw mismatch("int", value, path);
      }
      default:
        throw mismatch("int", value, path);
    }
  },
};

const numberValidator: TypeValidator = {
  type: "number",
  kind: "float",
  matches: (value) => value.kind === "int" || value.kind === "float",
  coerce(value, path) {
    switch (value.kind) {
      case "float":
        return value;
      case "int":
        return Value.float(Number(value.asInt()), value.location);
      case "string": {
        const text = value.asString();
        if (isVariableReference(text)) {
          return value;
        }
        const parsed = parseNumeric(text);
        if (parsed !== undefined) {
          return Value.float(parsed, value.location);
        }
        throw mismatch("float", value, path);
      }
      default:
        throw mismatch("float", value, path);
    }
  },
};

/**
 * Builds the dispatch table shared by the normalizer and template schemas.
 */
export function createTypeValidators(): TypeValidators {
  return {
    string: stringValidator,
    integer: integerValidator,
    number: numberValidator,
    boolean: booleanValidator,
  };
}
