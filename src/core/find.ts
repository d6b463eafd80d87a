import { stat } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import type { FindOptions } from "./types.ts";

export class DotenvNotFoundError extends Error {
  constructor(public filename: string, public searchedFrom: string) {
    super(`File not found: ${filename} (searched upwards from ${searchedFrom})`);
    this.name = "DotenvNotFoundError";
  }
}

export async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (isMissing(error)) return false;
    throw error;
  }
}

export function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR");
}

/**
 * Walks from `cwd` up to the filesystem root and returns the first `filename`
 * found, as an absolute path, or `""`.
 */
export async function findDotenv(options: FindOptions = {}): Promise<string> {
  const filename = options.filename ?? ".env";
  const start = resolve(options.cwd ?? process.cwd());

  let dir = start;
  while (true) {
    const candidate = join(dir, filename);
    if (await isFile(candidate)) {
      return candidate;
    }

    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  if (options.raiseErrorIfNotFound) {
    throw new DotenvNotFoundError(filename, start);
  }
  return "";
}
