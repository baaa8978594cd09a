import fs from "fs/promises";
import path from "path";
import type { ChannelFactory, ChannelPair } from "../src/channels";
import type { ProcessRunOptions, ProcessRunner } from "../src/process-runner";

export interface RecordedRun {
  command: string;
  args: readonly string[];
  options: ProcessRunOptions;
  input: string;
}

/**
 * Stands in for the plugin process: records the invocation, reads the input
 * channel and answers on the output channel.
 */
export class StubProcessRunner implements ProcessRunner {
  readonly runs: RecordedRun[] = [];

  constructor(
    private readonly channels: { current: ChannelPair | undefined },
    private readonly output: string,
    private readonly stdout: string[] = [],
  ) {}

  async run(command: string, args: readonly string[], options: ProcessRunOptions): Promise<void> {
    const pair = this.channels.current;
    if (!pair) {
      throw new Error("channels were not opened before the process ran");
    }

    const input = await pair.input.read();
    this.runs.push({ command, args, options, input });

    for (const line of this.stdout) {
      options.onLine?.("stdout", line);
    }
    await pair.output.write(this.output);
  }
}

/**
 * Wraps a factory and remembers the pair it opened last.
 */
export class RecordingChannelFactory implements ChannelFactory {
  current: ChannelPair | undefined;

  constructor(private readonly inner: ChannelFactory) {}

  async open(): Promise<ChannelPair> {
    this.current = await this.inner.open();
    return this.current;
  }
}

export async function createFakeVenv(root: string, venv: string): Promise<string> {
  const interpreter = path.join(root, venv, "bin", "python3");
  await fs.mkdir(path.dirname(interpreter), { recursive: true });
  await fs.writeFile(interpreter, "", { mode: 0o755 });
  return interpreter;
}
