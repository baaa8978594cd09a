import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createCacheDir } from "../src/cache-dir";
import { FileChannelFactory, MemoryChannel, MemoryChannelFactory } from "../src/channels";

describe("createCacheDir", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "cache-dir-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("uses a stable directory under the configured temp root", async () => {
    const first = await createCacheDir(tempDir);
    const second = await createCacheDir(tempDir);

    expect(first).toEqual({ path: path.join(tempDir, "default", "plugins"), temporary: false });
    expect(second.path).toBe(first.path);
    const stats = await fs.stat(first.path);
    expect(stats.isDirectory()).toBe(true);
    if (process.platform !== "win32") {
      expect(stats.mode & 0o777).toBe(0o700);
    }
  });

  it("creates a fresh directory without a temp root", async () => {
    const first = await createCacheDir();
    const second = await createCacheDir();

    try {
      expect(first.temporary).toBe(true);
      expect(first.path).not.toBe(second.path);
      expect((await fs.stat(first.path)).isDirectory()).toBe(true);
    } finally {
      await fs.rm(first.path, { recursive: true, force: true });
      await fs.rm(second.path, { recursive: true, force: true });
    }
  });
});

describe("FileChannelFactory", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "file-channels-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("writes and reads the interchange files", async () => {
    const pair = await new FileChannelFactory(tempDir).open();

    await pair.input.write('{"bundle":{}}');

    expect(pair.input.name).toBe(path.join(tempDir, "default", "plugins", "input.json"));
    expect(pair.output.name).toBe(path.join(tempDir, "default", "plugins", "output.json"));
    await expect(pair.input.read()).resolves.toBe('{"bundle":{}}');
  });

  it("discards output left over from an earlier run", async () => {
    const first = await new FileChannelFactory(tempDir).open();
    await first.output.write("{}");

    const second = await new FileChannelFactory(tempDir).open();

    await expect(second.output.read()).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("removes a fresh cache directory when disposed", async () => {
    const pair = await new FileChannelFactory().open();
    const dir = path.dirname(pair.input.name);

    await pair.dispose();

    await expect(fs.stat(dir)).rejects.toMatchObject({ code: "ENOENT" });
  });
});

describe("MemoryChannel", () => {
  it("returns what was written", async () => {
    const channel = new MemoryChannel("memory://input.json");

    await channel.write("{}");

    await expect(channel.read()).resolves.toBe("{}");
  });

  it("refuses to read before anything was written", async () => {
    await expect(new MemoryChannel("memory://output.json").read()).rejects.toThrow(
      "channel memory://output.json has not been written",
    );
  });

  it("keeps the latest pair reachable", async () => {
    const factory = new MemoryChannelFactory();

    const pair = await factory.open();

    expect(factory.current).toBe(pair);
    expect(pair.output.name).toBe("memory://output.json");
  });
});
