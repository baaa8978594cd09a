import fs from "fs/promises";
import path from "path";
import { InterpreterNotFoundError } from "./errors";

/**
 * Location of the interpreter inside a virtual environment.
 */
export function interpreterPath(
  venvPath: string,
  platform: NodeJS.Platform = process.platform,
): string {
  return platform === "win32"
    ? path.win32.join(venvPath, "Scripts", "python3.exe")
    : path.posix.join(venvPath, "bin", "python3");
}

export async function ensureInterpreter(file: string): Promise<string> {
  try {
    await fs.stat(file);
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new InterpreterNotFoundError(file, undefined, { cause: error });
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new InterpreterNotFoundError(file, reason, { cause: error });
  }
  return file;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
