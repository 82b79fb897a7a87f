/**
 * Temporary directory resource.
 *
 * @module
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { call, resource, type Operation } from "effection";

/**
 * Create a temporary directory that is removed when the scope exits.
 *
 * @param prefix - Prefix for the directory name
 */
export function useTempDir(prefix = "etiss-sweep-"): Operation<string> {
  return resource(function* (provide) {
    const dir = yield* call(() => mkdtemp(join(tmpdir(), prefix)));
    try {
      yield* provide(dir);
    } finally {
      yield* call(() => rm(dir, { recursive: true, force: true }));
    }
  });
}
