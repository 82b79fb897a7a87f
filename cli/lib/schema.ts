/**
 * Zod schemas for every file format the sweep runner reads or writes.
 * This is the single source of truth for catalogs, stats exports and
 * result artifacts.
 *
 * @module
 */

import { z } from "zod";

/**
 * JIT compilers the simulator can be configured with.
 */
export const JIT_KINDS = ["GCC", "TCC", "LLVM"] as const;

/**
 * JIT kind schema.
 */
export const JitKindSchema = z.enum(JIT_KINDS);

/**
 * JIT kind type.
 */
export type JitKind = z.infer<typeof JitKindSchema>;

/**
 * Command-line value meaning "run without a fast JIT".
 */
export const NO_FAST_JIT = "None";

/**
 * Optimization levels accepted by the GCC JIT.
 */
export const GccOptLevelSchema = z.enum(["0", "1", "2", "3", "s", "fast"]);

export type GccOptLevel = z.infer<typeof GccOptLevelSchema>;

/**
 * Optimization levels accepted by the LLVM JIT.
 */
export const LlvmOptLevelSchema = z.enum(["0", "1", "2", "3", "s", "z", "fast"]);

export type LlvmOptLevel = z.infer<typeof LlvmOptLevelSchema>;

/**
 * Which catalog a profile name belongs to.
 */
export const CATALOG_CATEGORIES = ["examples", "etiss"] as const;

export type CatalogCategory = (typeof CATALOG_CATEGORIES)[number];

/**
 * A single build profile entry. Only `description` is interpreted here,
 * the remaining fields belong to the build scripts.
 */
export const ProfileEntrySchema = z
  .object({
    description: z.string().optional(),
  })
  .passthrough();

/**
 * Build catalog file schema (etiss-builds.json, example-builds.json).
 */
export const CatalogSchema = z.object({
  builds: z.record(z.string(), ProfileEntrySchema),
});

export type Catalog = z.infer<typeof CatalogSchema>;

/**
 * A flat section of the stats export. Values are expected to be numeric,
 * anything else is read as absent.
 */
const StatsSectionSchema = z.record(z.string(), z.unknown());

export type StatsSection = z.infer<typeof StatsSectionSchema>;

/**
 * Structured stats file written by the simulator's JSON export.
 * Every section, and every key inside a section, may be missing.
 */
export const StatsFileSchema = z
  .object({
    metadata: StatsSectionSchema.optional(),
    performance: StatsSectionSchema.optional(),
    compilation: StatsSectionSchema.optional(),
    execution: StatsSectionSchema.optional(),
    optimization: StatsSectionSchema.optional(),
    cache: StatsSectionSchema.optional(),
    // Optional extra; anything but an object is dropped rather than failing the file
    category_breakdown: z.record(z.string(), z.unknown()).nullable().optional().catch(undefined),
  })
  .passthrough();

export type StatsFile = z.infer<typeof StatsFileSchema>;

/**
 * Numeric metrics of one benchmark run. Every field is always present;
 * absent source data is recorded as zero.
 */
export const BenchmarkMetricsSchema = z.object({
  // Performance
  mips_estimated: z.number(),
  mips_corrected: z.number(),
  sim_time: z.number(),
  wall_time: z.number(),
  cpu_cycles: z.number().int(),
  cpu_time_simulated: z.number(),

  // Compilation
  unique_blocks_compiled: z.number().int(),
  fast_jit_blocks: z.number().int(),
  optimizing_jit_blocks: z.number().int(),
  total_compilation_time_s: z.number(),
  fast_jit_compilation_time_s: z.number(),
  optimizing_jit_compilation_time_s: z.number(),
  block_execution_time_ms: z.number(),
  avg_fast_jit_time_ms: z.number(),
  avg_opt_jit_time_ms: z.number(),
  fast_jit_speedup: z.number(),
  compilation_percentage: z.number(),
  execution_percentage: z.number(),

  // Background optimization
  blocks_optimized: z.number().int(),
  blocks_switched: z.number().int(),
  optimization_success_rate: z.number(),
  switch_rate: z.number(),

  // Execution
  total_block_executions: z.number().int(),
  fast_jit_executions: z.number().int(),
  optimized_executions: z.number().int(),
  fast_jit_exec_percentage: z.number(),
  optimized_exec_percentage: z.number(),
  avg_executions_before_switch: z.number().int(),

  // Cache
  total_cache_lookups: z.number().int(),
  cache_sequential_hits: z.number().int(),
  cache_branch_hits: z.number().int(),
  cache_misses: z.number().int(),
  cache_hit_rate: z.number(),
  cache_miss_rate: z.number(),
});

export type BenchmarkMetrics = z.infer<typeof BenchmarkMetricsSchema>;

export type MetricName = keyof BenchmarkMetrics;

/**
 * Configuration columns of a persisted result.
 */
export const ResultConfigurationSchema = z.object({
  program: z.string().min(1),
  profile: z.string().min(1),
  etiss_variant: z.string().startsWith("etiss_"),
  jit: JitKindSchema,
  fast_jit: JitKindSchema.nullable(),
  block_size: z.number().int().positive(),
  optimization_threads: z.number().int().nonnegative().nullable(),
  gcc_opt_level: GccOptLevelSchema,
  llvm_opt_level: LlvmOptLevelSchema,
});

/**
 * References to on-disk artifacts of a run. Paths are always strings.
 */
export const ResultArtifactsSchema = z.object({
  profiling_report_path: z.string().nullable(),
  stats_json_path: z.string().nullable(),
  category_breakdown: z.record(z.string(), z.unknown()).nullable(),
});

/**
 * One fully populated benchmark result record.
 */
export const BenchmarkResultSchema = ResultConfigurationSchema.merge(
  BenchmarkMetricsSchema,
).merge(ResultArtifactsSchema);

export type BenchmarkResult = z.infer<typeof BenchmarkResultSchema>;

/**
 * Artifact written for a single profile/variant pair.
 */
export const SingleResultArtifactSchema = z.object({
  profile: z.string().min(1),
  etiss_variant: z.string().min(1),
  results: z.array(BenchmarkResultSchema),
});

/**
 * Artifact written for an outer sweep over several profiles/variants.
 */
export const MultiResultArtifactSchema = z.object({
  profiles: z.array(z.string().min(1)).min(1),
  etiss_variants: z.array(z.string().min(1)).min(1),
  results: z.array(BenchmarkResultSchema),
});

/**
 * Result artifact file schema.
 */
export const ResultArtifactSchema = z.union([
  SingleResultArtifactSchema,
  MultiResultArtifactSchema,
]);

export type SingleResultArtifact = z.infer<typeof SingleResultArtifactSchema>;

export type MultiResultArtifact = z.infer<typeof MultiResultArtifactSchema>;

export type ResultArtifact = z.infer<typeof ResultArtifactSchema>;

/**
 * Validate a result artifact and return the typed document.
 * Throws ZodError if validation fails.
 */
export function validateResultArtifact(data: unknown): ResultArtifact {
  return ResultArtifactSchema.parse(data);
}
