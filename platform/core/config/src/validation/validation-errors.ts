import { formatLocation, type Diagnostic } from "@bundlekit/dyn";

export class UndeclaredKeyError extends Error {
  constructor(readonly key: string) {
    super(`${key} is not defined as an input parameter for the template`);
    this.name = "UndeclaredKeyError";
  }
}

export class MissingKeyError extends Error {
  constructor(readonly key: string) {
    super(`input parameter ${key} is not defined in config`);
    this.name = "MissingKeyError";
  }
}

export class NotAnIntegerError extends Error {
  constructor(
    readonly key: string,
    readonly value: number | string,
  ) {
    super(`expected ${key} to have integer value but it is ${value}`);
    this.name = "NotAnIntegerError";
  }
}

/**
 * A schema file that does not describe a template's input parameters.
 */
export class InvalidSchemaFileError extends Error {
  constructor(
    readonly file: string,
    readonly detail: string,
  ) {
    super(`invalid template schema ${file}: ${detail}`);
    this.name = "InvalidSchemaFileError";
  }
}

/**
 * Fatal error diagnostics raised while normalizing a bundle file.
 */
export class SchemaValidationError extends Error {
  constructor(readonly diagnostics: readonly Diagnostic[]) {
    super(
      diagnostics
        .map((diagnostic) => `${formatLocation(diagnostic.location)}: ${diagnostic.summary}`)
        .join("\n"),
    );
    this.name = "SchemaValidationError";
  }
}
