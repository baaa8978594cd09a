import type { Diagnostic } from "@bundlekit/dyn";

export class PluginSettingsError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PluginSettingsError";
  }
}

export class InterpreterNotFoundError extends Error {
  /** Without a reason the interpreter simply does not exist. */
  constructor(
    readonly interpreterPath: string,
    readonly reason?: string,
    options?: ErrorOptions,
  ) {
    super(
      reason === undefined
        ? `can't find "${interpreterPath}", check if venv is created`
        : `can't find "${interpreterPath}": ${reason}`,
      options,
    );
    this.name = "InterpreterNotFoundError";
  }
}

export interface ProcessErrorOptions extends ErrorOptions {
  exitCode?: number;
}

/**
 * The plugin process could not be started or exited unsuccessfully.
 */
export class ProcessError extends Error {
  readonly exitCode?: number;

  constructor(detail: string, options: ProcessErrorOptions = {}) {
    super(`plugin process failed: ${detail}`, { cause: options.cause });
    this.name = "ProcessError";
    this.exitCode = options.exitCode;
  }
}

export class PluginCancelledError extends Error {
  constructor(message = "plugin run was cancelled") {
    super(message);
    this.name = "PluginCancelledError";
  }
}

/**
 * The plugin wrote a document that could not be loaded or normalized.
 */
export class PluginOutputError extends Error {
  constructor(
    message: string,
    readonly diagnostics: readonly Diagnostic[] = [],
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "PluginOutputError";
  }
}
