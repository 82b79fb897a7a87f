/**
 * Result store.
 *
 * Artifacts are assembled in memory, validated, and written as one
 * document that replaces any previous file at the destination.
 *
 * @module
 */

import type { Operation } from "effection";
import { readTextFile, replaceTextFile } from "./fs.ts";
import {
  type BenchmarkResult,
  type MultiResultArtifact,
  type ResultArtifact,
  type SingleResultArtifact,
  validateResultArtifact,
} from "./schema.ts";

/**
 * Artifact for one profile/variant sweep.
 */
export function singleArtifact(
  profile: string,
  etissVariant: string,
  results: BenchmarkResult[],
): SingleResultArtifact {
  return { profile, etiss_variant: etissVariant, results };
}

/**
 * Artifact for an outer sweep over several profiles and variants.
 */
export function multiArtifact(
  profiles: string[],
  etissVariants: string[],
  results: BenchmarkResult[],
): MultiResultArtifact {
  return { profiles, etiss_variants: etissVariants, results };
}

/**
 * Serialize an artifact. Throws ZodError if it does not match the schema.
 */
export function serializeArtifact(artifact: ResultArtifact): string {
  return JSON.stringify(validateResultArtifact(artifact), null, 2) + "\n";
}

/**
 * Write an artifact to `destination`, replacing it as a whole.
 */
export function* saveResults(artifact: ResultArtifact, destination: string): Operation<void> {
  const content = serializeArtifact(artifact);
  yield* replaceTextFile(destination, content);
  console.log(`\nResults saved to: ${destination}`);
}

/**
 * Read and validate an artifact.
 */
export function* loadResults(path: string): Operation<ResultArtifact> {
  const text = yield* readTextFile(path);
  return validateResultArtifact(JSON.parse(text));
}
