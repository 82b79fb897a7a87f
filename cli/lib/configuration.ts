/**
 * Sweep point configuration and ETISS variant naming.
 *
 * @module
 */

import type { GccOptLevel, JitKind, LlvmOptLevel } from "./schema.ts";
import type { Optional } from "./optional.ts";

/**
 * Prefix the build scripts expect on every ETISS variant identifier.
 */
export const VARIANT_PREFIX = "etiss_";

/**
 * An ETISS variant in canonical (prefixed) and display (unprefixed) form.
 * Only construct through {@link toVariant}.
 */
export interface EtissVariant {
  readonly canonical: string;
  readonly display: string;
}

/**
 * Strip every leading variant prefix, so `etiss_etiss_foo` displays as `foo`.
 */
export function displayVariant(name: string): string {
  let display = name;
  while (display.startsWith(VARIANT_PREFIX)) {
    display = display.slice(VARIANT_PREFIX.length);
  }
  return display;
}

/**
 * Canonical form: exactly one variant prefix. Idempotent.
 */
export function normalizeVariant(name: string): string {
  return `${VARIANT_PREFIX}${displayVariant(name)}`;
}

export function toVariant(name: string): EtissVariant {
  const display = displayVariant(name);
  return { canonical: `${VARIANT_PREFIX}${display}`, display };
}

/**
 * One point of the configuration space.
 */
export interface BenchmarkConfiguration {
  program: string;
  /** Examples build profile */
  profile: string;
  variant: EtissVariant;
  jit: JitKind;
  fastJit: Optional<JitKind>;
  blockSize: number;
  optimizationThreads: Optional<number>;
  gccOptLevel: GccOptLevel;
  llvmOptLevel: LlvmOptLevel;
}

/**
 * Human-readable one-line summary, e.g.
 * `dhry (JIT: TCC, fast: GCC, threads: 2, block: 100)`.
 */
export function describeConfiguration(config: BenchmarkConfiguration): string {
  const fast = config.fastJit.present ? `, fast: ${config.fastJit.value}` : "";
  const threads = config.optimizationThreads.present
    ? `, threads: ${config.optimizationThreads.value}`
    : "";
  return `${config.program} (JIT: ${config.jit}${fast}${threads}, block: ${config.blockSize})`;
}
