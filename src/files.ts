import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

import { isNotFoundError } from "./result.ts";

/**
 * Create the parent directory of `path` (like mkdir -p) if it is not the
 * current directory.
 */
export async function ensureParentDir(path: string): Promise<void> {
  const dir = dirname(path);
  if (dir && dir !== ".") {
    await mkdir(dir, { recursive: true });
  }
}

/**
 * Read a text file, or return undefined when it does not exist.
 * Any other failure (permissions, a directory in the way) is thrown.
 */
export async function readTextIfExists(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    if (isNotFoundError(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Replace a file's whole content.
 *
 * The new content goes to a sibling temporary file which is then renamed over
 * the target, so a crash mid-write leaves either the old or the new file,
 * never a truncated one. Still last-writer-wins: there is no locking.
 */
export async function replaceFile(path: string, content: string): Promise<void> {
  await ensureParentDir(path);
  const tempPath = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`);
  try {
    await writeFile(tempPath, content, "utf8");
    await rename(tempPath, path);
  } catch (error) {
    // Leave no stray temp file behind, then report the original failure
    await rm(tempPath, { force: true });
    throw error;
  }
}
