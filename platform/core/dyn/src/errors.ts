import { formatLocation, type Location } from "./location";
import type { Path } from "./path";

export class InvalidPathError extends Error {
  constructor(
    readonly input: string,
    readonly reason: string,
  ) {
    super(`invalid path "${input}": ${reason}`);
    this.name = "InvalidPathError";
  }
}

export interface TypeMismatchErrorOptions {
  path?: Path;
  message?: string;
}

/**
 * Raised when a value is accessed or validated as a kind it does not have.
 */
export class TypeMismatchError extends Error {
  readonly path?: Path;

  constructor(
    readonly expected: string,
    readonly actual: string,
    options: TypeMismatchErrorOptions = {},
  ) {
    super(options.message ?? `expected ${expected}, found ${actual}`);
    this.name = "TypeMismatchError";
    this.path = options.path;
  }
}

export class DuplicateKeyError extends Error {
  constructor(
    readonly path: Path,
    readonly firstLocation: Location,
    readonly secondLocation: Location,
  ) {
    super(
      `${formatLocation(secondLocation)}: duplicate key "${path.toString()}", first declared at ${formatLocation(firstLocation)}`,
    );
    this.name = "DuplicateKeyError";
  }
}

export type OverrideOperation = "insert" | "update" | "delete";

export class MergeViolationError extends Error {
  constructor(
    readonly path: Path,
    readonly operation: OverrideOperation,
  ) {
    super(`unexpected change at "${path.toString()}" (${operation})`);
    this.name = "MergeViolationError";
  }
}
