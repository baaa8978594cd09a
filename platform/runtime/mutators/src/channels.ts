import fs from "fs/promises";
import path from "path";
import { createCacheDir } from "./cache-dir";

export const INPUT_CHANNEL_NAME = "input.json";
export const OUTPUT_CHANNEL_NAME = "output.json";

/**
 * Named byte channel shared with the plugin process. `name` is what the
 * process receives on its command line.
 */
export interface Channel {
  readonly name: string;
  write(contents: string): Promise<void>;
  read(): Promise<string>;
}

export interface ChannelPair {
  readonly input: Channel;
  readonly output: Channel;
  dispose(): Promise<void>;
}

export interface ChannelFactory {
  open(): Promise<ChannelPair>;
}

export class FileChannel implements Channel {
  constructor(readonly name: string) {}

  async write(contents: string): Promise<void> {
    await fs.writeFile(this.name, contents, { encoding: "utf-8", mode: 0o600 });
  }

  read(): Promise<string> {
    return fs.readFile(this.name, "utf-8");
  }
}

/**
 * Channels backed by `input.json` and `output.json` in the plugin cache
 * directory.
 */
export class FileChannelFactory implements ChannelFactory {
  constructor(private readonly tempDir?: string) {}

  async open(): Promise<ChannelPair> {
    const cacheDir = await createCacheDir(this.tempDir);
    const input = new FileChannel(path.join(cacheDir.path, INPUT_CHANNEL_NAME));
    const output = new FileChannel(path.join(cacheDir.path, OUTPUT_CHANNEL_NAME));

    // Output left over from an earlier run must never be read back.
    await fs.rm(output.name, { force: true });

    return {
      input,
      output,
      dispose: async () => {
        if (cacheDir.temporary) {
          await fs.rm(cacheDir.path, { recursive: true, force: true });
        }
      },
    };
  }
}

export class MemoryChannel implements Channel {
  private contents: string | undefined;

  constructor(readonly name: string) {}

  async write(contents: string): Promise<void> {
    this.contents = contents;
  }

  async read(): Promise<string> {
    if (this.contents === undefined) {
      throw new Error(`channel ${this.name} has not been written`);
    }
    return this.contents;
  }
}

/**
 * In-process channels. Each `open` hands out a fresh pair; the latest pair
 * stays reachable through `current` so a stand-in process can answer.
 */
export class MemoryChannelFactory implements ChannelFactory {
  current: ChannelPair | undefined;

  async open(): Promise<ChannelPair> {
    const pair: ChannelPair = {
      input: new MemoryChannel(`memory://${INPUT_CHANNEL_NAME}`),
      output: new MemoryChannel(`memory://${OUTPUT_CHANNEL_NAME}`),
      dispose: async () => undefined,
    };
    this.current = pair;
    return pair;
  }
}
