import fs from "fs/promises";
import os from "os";
import path from "path";

export interface CacheDir {
  readonly path: string;
  /** Fresh directories are removed once the plugin run finishes. */
  readonly temporary: boolean;
}

/**
 * Directory the interchange files live in. With a configured temp root the
 * directory is stable across runs; otherwise each run gets its own.
 */
export async function createCacheDir(tempDir?: string): Promise<CacheDir> {
  if (tempDir) {
    const dir = path.join(tempDir, "default", "plugins");
    await fs.mkdir(dir, { recursive: true, mode: 0o700 });
    return { path: dir, temporary: false };
  }

  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "bundlekit-plugins-"));
  return { path: dir, temporary: true };
}
