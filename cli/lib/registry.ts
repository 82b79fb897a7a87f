/**
 * Profile registry over the two build catalogs.
 *
 * Lookups never throw: a missing catalog, malformed JSON or an unknown
 * name is reported on stderr and yields `undefined`, leaving the caller
 * to skip or fail that profile.
 *
 * @module
 */

import type { Operation } from "effection";
import { displayVariant } from "./configuration.ts";
import type { ResolvedPaths } from "./environment.ts";
import { ConfigLookupError } from "./errors.ts";
import { readTextFile } from "./fs.ts";
import { toError } from "./result.ts";
import { type Catalog, type CatalogCategory, CatalogSchema } from "./schema.ts";

/**
 * A catalog entry with its key copied into `name`.
 */
export type ProfileRecord = Record<string, unknown> & {
  name: string;
  description?: string;
};

export interface ProfileSummary {
  name: string;
  description?: string;
}

export interface ProfileRegistry {
  /**
   * Resolve a profile by name. ETISS variant names may carry the
   * `etiss_` prefix; catalog keys do not.
   */
  getProfile(name: string, category: CatalogCategory): Operation<ProfileRecord | undefined>;

  /**
   * All profiles of a catalog in file order. Throws if the catalog
   * cannot be read.
   */
  listProfiles(category: CatalogCategory): Operation<ProfileSummary[]>;
}

type CatalogPaths = Pick<ResolvedPaths, "etissCatalog" | "examplesCatalog">;

function catalogPath(paths: CatalogPaths, category: CatalogCategory): string {
  return category === "etiss" ? paths.etissCatalog : paths.examplesCatalog;
}

function* loadCatalog(path: string): Operation<Catalog> {
  const text = yield* readTextFile(path);
  return CatalogSchema.parse(JSON.parse(text));
}

export function createProfileRegistry(paths: CatalogPaths): ProfileRegistry {
  return {
    *getProfile(name, category) {
      const path = catalogPath(paths, category);
      const key = category === "etiss" ? displayVariant(name) : name;

      let catalog: Catalog;
      try {
        catalog = yield* loadCatalog(path);
      } catch (error: unknown) {
        console.error(new ConfigLookupError(name, path, toError(error).message).message);
        return undefined;
      }

      if (!Object.hasOwn(catalog.builds, key)) {
        console.error(new ConfigLookupError(name, path, `no build named "${key}"`).message);
        return undefined;
      }

      return { ...catalog.builds[key], name: key };
    },

    *listProfiles(category) {
      const catalog = yield* loadCatalog(catalogPath(paths, category));
      return Object.entries(catalog.builds).map(([name, entry]) => ({
        name,
        description: entry.description,
      }));
    },
  };
}
