/**
 * Filesystem helpers lifted into operations.
 *
 * @module
 */

import { mkdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { call, type Operation } from "effection";
import { toError } from "./result.ts";

/**
 * Whether an error is a Node "no such file or directory" error.
 */
export function isNotFound(error: unknown): boolean {
  const err = toError(error);
  return "code" in err && err.code === "ENOENT";
}

/**
 * Check whether a regular file exists. Errors other than ENOENT propagate.
 */
export function* fileExists(path: string): Operation<boolean> {
  try {
    const info = yield* call(() => stat(path));
    return info.isFile();
  } catch (error: unknown) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}

export function* readTextFile(path: string): Operation<string> {
  return yield* call(() => readFile(path, "utf8"));
}

export function* ensureDir(path: string): Operation<void> {
  yield* call(() => mkdir(path, { recursive: true }));
}

/**
 * Replace `path` with `content` in one step: the text goes to a sibling
 * temporary file which is then renamed over the destination.
 */
export function* replaceTextFile(path: string, content: string): Operation<void> {
  yield* ensureDir(dirname(path));
  const tmp = `${path}.${process.pid}.tmp`;
  try {
    yield* call(() => writeFile(tmp, content, "utf8"));
    yield* call(() => rename(tmp, path));
  } catch (error: unknown) {
    yield* call(() => rm(tmp, { force: true }));
    throw error;
  }
}
