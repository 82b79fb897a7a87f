/**
 * list-profiles command implementation.
 *
 * Lists the examples build profiles and ETISS variants from the catalogs.
 *
 * @module
 */

import type { Operation } from "effection";
import { PROJECT_ROOT, resolvePaths, snapshotEnv } from "../lib/environment.ts";
import { createProfileRegistry, type ProfileRegistry } from "../lib/registry.ts";
import { wrapResult } from "../lib/result.ts";
import type { CatalogCategory } from "../lib/schema.ts";

const SECTIONS: { category: CatalogCategory; title: string }[] = [
  { category: "examples", title: "Examples build profiles" },
  { category: "etiss", title: "ETISS variants" },
];

/**
 * Print both catalogs. Returns 1 if either could not be read.
 */
export function* printProfiles(registry: ProfileRegistry): Operation<number> {
  let code = 0;

  for (const { category, title } of SECTIONS) {
    console.log(`${title}:`);
    const listed = yield* wrapResult(category, registry.listProfiles(category));
    if (!listed.ok) {
      console.error(`  Failed to read ${listed.context} catalog: ${listed.error.message}`);
      code = 1;
      continue;
    }
    for (const { name, description } of listed.value) {
      console.log(description ? `  - ${name}: ${description}` : `  - ${name}`);
    }
    console.log();
  }

  return code;
}

export function* listProfilesCommand(_args: string[]): Operation<number> {
  const paths = resolvePaths(snapshotEnv(process.env), PROJECT_ROOT);
  return yield* printProfiles(createProfileRegistry(paths));
}
