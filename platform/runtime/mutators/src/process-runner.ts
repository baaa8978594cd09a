import { spawn, type SpawnOptions } from "child_process";
import { once } from "events";
import { createInterface } from "readline";
import type { Readable } from "stream";
import { PluginCancelledError, ProcessError } from "./errors";

export type OutputStream = "stdout" | "stderr";

export interface ProcessRunOptions {
  cwd: string;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
  onLine?: (stream: OutputStream, line: string) => void;
}

export interface ProcessRunner {
  run(command: string, args: readonly string[], options: ProcessRunOptions): Promise<void>;
}

/**
 * The part of `ChildProcess` the runner relies on.
 */
export interface SpawnedProcess {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(
    event: "close",
    listener: (code: number | null, signal: NodeJS.Signals | null) => void,
  ): this;
  once(event: "error", listener: (error: Error) => void): this;
}

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => SpawnedProcess;

interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

function drainLines(
  stream: Readable | null,
  onLine: (line: string) => void,
): Promise<void> {
  if (!stream) {
    return Promise.resolve();
  }

  const lines = createInterface({ input: stream, crlfDelay: Infinity });
  lines.on("line", onLine);
  return once(lines, "close").then(() => undefined);
}

function describeExit(status: ExitStatus): string {
  return status.signal
    ? `terminated by ${status.signal}`
    : `exit code ${status.code ?? "unknown"}`;
}

/**
 * Runs a child process to completion, streaming stdout and stderr line by
 * line while it runs. Resolves once the process exited successfully and both
 * streams are drained. An abort sends SIGTERM and rejects with
 * `PluginCancelledError` after the process is gone.
 */
export class SpawnProcessRunner implements ProcessRunner {
  constructor(private readonly spawnImpl: SpawnFunction = spawn) {}

  run(command: string, args: readonly string[], options: ProcessRunOptions): Promise<void> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new PluginCancelledError());
    }

    return new Promise<void>((resolve, reject) => {
      let settled = false;
      let cancelled = false;
      let child: SpawnedProcess | undefined;

      // The run settles only once the child has exited and its output drained.
      const onAbort = () => {
        cancelled = true;
        child?.kill("SIGTERM");
      };

      const settle = (error?: Error) => {
        if (settled) {
          return;
        }
        settled = true;
        signal?.removeEventListener("abort", onAbort);
        if (cancelled) {
          reject(new PluginCancelledError());
        } else if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      try {
        child = this.spawnImpl(command, args, {
          cwd: options.cwd,
          env: options.env ?? { ...process.env },
          stdio: ["ignore", "pipe", "pipe"],
        });
      } catch (error) {
        settle(
          new ProcessError(error instanceof Error ? error.message : String(error), {
            cause: error,
          }),
        );
        return;
      }

      signal?.addEventListener("abort", onAbort, { once: true });

      child.once("error", (error) => {
        settle(new ProcessError(error.message, { cause: error }));
      });

      const exited = new Promise<ExitStatus>((resolveExit) => {
        child?.once("close", (code, exitSignal) => {
          resolveExit({ code, signal: exitSignal });
        });
      });

      const onLine = options.onLine;
      const drained = [
        drainLines(child.stdout, (line) => onLine?.("stdout", line)),
        drainLines(child.stderr, (line) => onLine?.("stderr", line)),
      ];

      Promise.all([exited, ...drained]).then(
        ([status]) => {
          settle(
            status.code === 0
              ? undefined
              : new ProcessError(describeExit(status), {
                  exitCode: status.code ?? undefined,
                }),
          );
        },
        (error: unknown) => {
          settle(error instanceof Error ? error : new ProcessError(String(error)));
        },
      );
    });
  }
}
