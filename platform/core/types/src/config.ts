export type LogLevel =
  | "silent"
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace";

export const LOG_LEVELS: readonly LogLevel[] = [
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LoggingConfig {
  level: LogLevel;
  /** Writes JSON lines to this file instead of the terminal. */
  file?: string;
}

/**
 * Options that shape a single run of the configuration engine. Values are
 * resolved from module registration first and from the environment second.
 */
export interface RuntimeOptions {
  /**
   * Directory that holds `bundle.yml`. Relative include patterns and the
   * plugin virtual path are anchored here.
   */
  projectRoot?: string;
  /**
   * Stable temp root for plugin cache directories. When unset every plugin
   * call gets a fresh directory.
   */
  tempDir?: string;
  logLevel?: LogLevel;
  logFile?: string;
}
