import { isLogLevel, type LogLevel, type RuntimeOptions } from "@bundlekit/types";

function parseString(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = parseString(value)?.toLowerCase();
  if (normalized !== undefined && isLogLevel(normalized)) {
    return normalized;
  }

  return undefined;
}

export function resolveRuntimeOptionsFromEnv(
  env: NodeJS.ProcessEnv,
): RuntimeOptions {
  const options: RuntimeOptions = {};

  const projectRoot = parseString(env.BUNDLEKIT_ROOT);
  if (projectRoot !== undefined) {
    options.projectRoot = projectRoot;
  }

  const tempDir = parseString(env.BUNDLEKIT_TMPDIR);
  if (tempDir !== undefined) {
    options.tempDir = tempDir;
  }

  const logLevel = parseLogLevel(env.BUNDLEKIT_LOG_LEVEL);
  if (logLevel !== undefined) {
    options.logLevel = logLevel;
  }

  const logFile = parseString(env.BUNDLEKIT_LOG_FILE);
  if (logFile !== undefined) {
    options.logFile = logFile;
  }

  return options;
}

/**
 * Layers module registration options over environment values. Keys set to
 * `undefined` in the module options do not hide environment values.
 */
export function resolveRuntimeOptions(
  moduleOptions?: RuntimeOptions,
  envOptions: RuntimeOptions = resolveRuntimeOptionsFromEnv(process.env),
): RuntimeOptions {
  const resolved: RuntimeOptions = { ...envOptions };

  if (moduleOptions?.projectRoot !== undefined) {
    resolved.projectRoot = moduleOptions.projectRoot;
  }

  if (moduleOptions?.tempDir !== undefined) {
    resolved.tempDir = moduleOptions.tempDir;
  }

  if (moduleOptions?.logLevel !== undefined) {
    resolved.logLevel = moduleOptions.logLevel;
  }

  if (moduleOptions?.logFile !== undefined) {
    resolved.logFile = moduleOptions.logFile;
  }

  return resolved;
}
