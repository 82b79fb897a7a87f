/**
 * Result extraction.
 *
 * A run is turned into a {@link BenchmarkResult} from the structured JSON
 * stats export when the file exists, and from labeled lines of the run's
 * stdout otherwise. Missing data always becomes zero; only a stats file
 * that exists but cannot be read as a stats document is an error.
 *
 * @module
 */

import type { Operation } from "effection";
import type { BenchmarkConfiguration } from "./configuration.ts";
import { MalformedStatsFileError } from "./errors.ts";
import { fileExists, readTextFile } from "./fs.ts";
import type { RawPayload } from "./invoker.ts";
import { toNullable } from "./optional.ts";
import { toError } from "./result.ts";
import {
  type BenchmarkMetrics,
  type BenchmarkResult,
  type MetricName,
  type StatsFile,
  StatsFileSchema,
  type StatsSection,
} from "./schema.ts";

/**
 * Outcome of looking for a run's stats export.
 */
export type StatsLookup =
  | { kind: "found"; path: string }
  | { kind: "not-found"; path: string };

type SectionName = "performance" | "compilation" | "execution" | "optimization" | "cache";

interface StatsFieldMapping {
  field: MetricName;
  section: SectionName;
  key: string;
  /** Counts exported as floats, truncated toward zero */
  integer?: boolean;
}

/**
 * Where each metric lives in the stats export.
 */
export const STATS_FIELDS: readonly StatsFieldMapping[] = [
  { field: "mips_estimated", section: "performance", key: "mips_estimated" },
  { field: "mips_corrected", section: "performance", key: "mips_corrected" },
  { field: "sim_time", section: "performance", key: "simulation_time_s" },
  { field: "wall_time", section: "performance", key: "wall_time_s" },
  { field: "cpu_cycles", section: "performance", key: "cpu_cycles", integer: true },
  { field: "cpu_time_simulated", section: "performance", key: "cpu_time_s" },

  { field: "unique_blocks_compiled", section: "compilation", key: "unique_blocks", integer: true },
  { field: "fast_jit_blocks", section: "compilation", key: "fast_jit_blocks", integer: true },
  { field: "optimizing_jit_blocks", section: "compilation", key: "optimizing_jit_blocks", integer: true },
  { field: "total_compilation_time_s", section: "compilation", key: "total_time_s" },
  { field: "fast_jit_compilation_time_s", section: "compilation", key: "fast_jit_time_s" },
  { field: "optimizing_jit_compilation_time_s", section: "compilation", key: "optimizing_jit_time_s" },
  { field: "avg_fast_jit_time_ms", section: "compilation", key: "avg_fast_jit_time_ms" },
  { field: "avg_opt_jit_time_ms", section: "compilation", key: "avg_optimizing_jit_time_ms" },
  { field: "fast_jit_speedup", section: "compilation", key: "fast_jit_speedup" },
  { field: "compilation_percentage", section: "compilation", key: "compilation_percentage" },
  { field: "execution_percentage", section: "compilation", key: "execution_percentage" },

  { field: "total_block_executions", section: "execution", key: "total_block_executions", integer: true },
  { field: "fast_jit_executions", section: "execution", key: "fast_jit_executions", integer: true },
  { field: "optimized_executions", section: "execution", key: "optimized_executions", integer: true },
  { field: "fast_jit_exec_percentage", section: "execution", key: "fast_jit_exec_percentage" },
  { field: "optimized_exec_percentage", section: "execution", key: "optimized_exec_percentage" },
  { field: "block_execution_time_ms", section: "execution", key: "block_execution_time_ms" },

  { field: "blocks_optimized", section: "optimization", key: "blocks_optimized", integer: true },
  { field: "blocks_switched", section: "optimization", key: "blocks_switched", integer: true },
  { field: "optimization_success_rate", section: "optimization", key: "optimization_success_rate" },
  { field: "switch_rate", section: "optimization", key: "switch_rate" },
  { field: "avg_executions_before_switch", section: "optimization", key: "avg_executions_before_switch", integer: true },

  { field: "total_cache_lookups", section: "cache", key: "total_lookups", integer: true },
  { field: "cache_sequential_hits", section: "cache", key: "sequential_hits", integer: true },
  { field: "cache_branch_hits", section: "cache", key: "branch_hits", integer: true },
  { field: "cache_misses", section: "cache", key: "misses", integer: true },
  { field: "cache_hit_rate", section: "cache", key: "hit_rate" },
  { field: "cache_miss_rate", section: "cache", key: "miss_rate" },
];

interface StdoutPattern {
  field: MetricName;
  pattern: RegExp;
  integer?: boolean;
}

/**
 * Labeled metrics recognized in the simulator's textual summary.
 */
export const STDOUT_PATTERNS: readonly StdoutPattern[] = [
  { field: "mips_estimated", pattern: /MIPS \(estimated\): ([\d.e+-]+)/ },
  { field: "mips_corrected", pattern: /MIPS \(corrected\): ([\d.e+-]+)/ },
  { field: "sim_time", pattern: /Simulation Time: ([\d.e+-]+)s/ },
  { field: "wall_time", pattern: /Wallclock Time: ([\d.e+-]+)s/ },
  { field: "cpu_cycles", pattern: /CPU Cycles \(estimated\): ([\d.e+-]+)/, integer: true },
];

export function emptyMetrics(): BenchmarkMetrics {
  return {
    mips_estimated: 0,
    mips_corrected: 0,
    sim_time: 0,
    wall_time: 0,
    cpu_cycles: 0,
    cpu_time_simulated: 0,
    unique_blocks_compiled: 0,
    fast_jit_blocks: 0,
    optimizing_jit_blocks: 0,
    total_compilation_time_s: 0,
    fast_jit_compilation_time_s: 0,
    optimizing_jit_compilation_time_s: 0,
    block_execution_time_ms: 0,
    avg_fast_jit_time_ms: 0,
    avg_opt_jit_time_ms: 0,
    fast_jit_speedup: 0,
    compilation_percentage: 0,
    execution_percentage: 0,
    blocks_optimized: 0,
    blocks_switched: 0,
    optimization_success_rate: 0,
    switch_rate: 0,
    total_block_executions: 0,
    fast_jit_executions: 0,
    optimized_executions: 0,
    fast_jit_exec_percentage: 0,
    optimized_exec_percentage: 0,
    avg_executions_before_switch: 0,
    total_cache_lookups: 0,
    cache_sequential_hits: 0,
    cache_branch_hits: 0,
    cache_misses: 0,
    cache_hit_rate: 0,
    cache_miss_rate: 0,
  };
}

function normalize(value: number, integer: boolean | undefined): number {
  if (!Number.isFinite(value)) return 0;
  return integer ? Math.trunc(value) : value;
}

function readMetric(section: StatsSection | undefined, key: string): number {
  const value = section?.[key];
  return typeof value === "number" ? value : 0;
}

/**
 * Assemble a full result record from a configuration and its metrics.
 */
export function buildResult(
  config: BenchmarkConfiguration,
  metrics: BenchmarkMetrics,
  artifacts: Partial<Pick<BenchmarkResult, "profiling_report_path" | "stats_json_path" | "category_breakdown">> = {},
): BenchmarkResult {
  return {
    program: config.program,
    profile: config.profile,
    etiss_variant: config.variant.canonical,
    jit: config.jit,
    fast_jit: toNullable(config.fastJit),
    block_size: config.blockSize,
    optimization_threads: toNullable(config.optimizationThreads),
    gcc_opt_level: config.gccOptLevel,
    llvm_opt_level: config.llvmOptLevel,
    ...metrics,
    profiling_report_path: artifacts.profiling_report_path ?? null,
    stats_json_path: artifacts.stats_json_path ?? null,
    category_breakdown: artifacts.category_breakdown ?? null,
  };
}

/**
 * Map a parsed stats export onto a result.
 */
export function fromStatsFile(
  stats: StatsFile,
  config: BenchmarkConfiguration,
  statsPath: string,
): BenchmarkResult {
  const metrics = emptyMetrics();
  for (const { field, section, key, integer } of STATS_FIELDS) {
    metrics[field] = normalize(readMetric(stats[section], key), integer);
  }
  return buildResult(config, metrics, {
    stats_json_path: statsPath,
    category_breakdown: stats.category_breakdown,
  });
}

/**
 * Recover the labeled metrics from textual run output. Fields without a
 * matching line stay zero.
 */
export function fromStdout(stdout: string, config: BenchmarkConfiguration): BenchmarkResult {
  const metrics = emptyMetrics();
  for (const { field, pattern, integer } of STDOUT_PATTERNS) {
    const match = stdout.match(pattern);
    if (match) {
      metrics[field] = normalize(Number(match[1]), integer);
    }
  }
  return buildResult(config, metrics);
}

/**
 * Look for the stats export of a run.
 */
export function* locateStats(path: string): Operation<StatsLookup> {
  return (yield* fileExists(path)) ? { kind: "found", path } : { kind: "not-found", path };
}

/**
 * Read and validate a stats export.
 */
export function* readStatsFile(path: string): Operation<StatsFile> {
  const text = yield* readTextFile(path);

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error: unknown) {
    throw new MalformedStatsFileError(path, toError(error).message, error);
  }

  const parsed = StatsFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new MalformedStatsFileError(path, parsed.error.message, parsed.error);
  }
  return parsed.data;
}

/**
 * Turn a run's raw output into a result, preferring the stats export.
 */
export function* extractResult(payload: RawPayload): Operation<BenchmarkResult> {
  const lookup = yield* locateStats(payload.statsPath);

  if (lookup.kind === "found") {
    const stats = yield* readStatsFile(lookup.path);
    return fromStatsFile(stats, payload.configuration, lookup.path);
  }

  console.warn(
    `Warning: JSON stats file not found at ${lookup.path}, falling back to regex parsing`,
  );
  return fromStdout(payload.stdout, payload.configuration);
}
