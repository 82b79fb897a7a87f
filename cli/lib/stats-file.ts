/**
 * Naming of per-run JIT stats files.
 *
 * Format:
 *   <program>_profile-<p>_variant-<v>_jit-<j>[_fast-<f>[_threads-<n>]]_block-<b>_<YYYYMMDD_HHMMSS>[-<k>].json
 *
 * The thread count is only encoded alongside a fast JIT, since background
 * optimization is inactive without one. The timestamp has one-second
 * resolution; {@link StatsFileNamer} appends `-<k>` when it has already
 * issued the same name in this process.
 *
 * @module
 */

import type { BenchmarkConfiguration } from "./configuration.ts";

const SEPARATOR = "_";
const EXTENSION = ".json";

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Local time as `YYYYMMDD_HHMMSS`.
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * Build the stats filename for a configuration at a point in time.
 */
export function statsFilename(config: BenchmarkConfiguration, at: Date): string {
  const parts = [
    config.program,
    `profile-${config.profile}`,
    `variant-${config.variant.display}`,
    `jit-${config.jit}`,
  ];

  if (config.fastJit.present) {
    parts.push(`fast-${config.fastJit.value}`);
    if (config.optimizationThreads.present) {
      parts.push(`threads-${config.optimizationThreads.value}`);
    }
  }

  parts.push(`block-${config.blockSize}`);
  parts.push(formatTimestamp(at));

  return parts.join(SEPARATOR) + EXTENSION;
}

/**
 * Issues stats filenames, disambiguating repeats within one process.
 */
export class StatsFileNamer {
  private readonly issued = new Map<string, number>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  next(config: BenchmarkConfiguration): string {
    const base = statsFilename(config, this.now());
    const count = (this.issued.get(base) ?? 0) + 1;
    this.issued.set(base, count);

    if (count === 1) {
      return base;
    }
    return `${base.slice(0, -EXTENSION.length)}-${count}${EXTENSION}`;
  }
}

/**
 * Fields recovered from a stats filename.
 */
export interface StatsFileInfo {
  program: string;
  profile: string;
  variant: string;
  jit: string;
  fastJit: string | null;
  threads: number | null;
  blockSize: number;
  /** YYYY-MM-DD */
  date: string;
  time: string;
}

const STATS_FILENAME_PATTERN =
  /^(.+?)_profile-(.+?)_variant-(.+?)_jit-([A-Z]+)(?:_fast-([A-Z]+)(?:_threads-(\d+))?)?_block-(\d+)_(\d{4})(\d{2})(\d{2})_(\d{6})(?:-\d+)?\.json$/;

/**
 * Parse a stats filename. Returns null for names not produced by
 * {@link statsFilename}.
 */
export function parseStatsFilename(filename: string): StatsFileInfo | null {
  const match = filename.match(STATS_FILENAME_PATTERN);
  if (!match) return null;

  const [, program, profile, variant, jit, fastJit, threads, block, year, month, day, time] =
    match;

  return {
    program,
    profile,
    variant,
    jit,
    fastJit: fastJit ?? null,
    threads: threads === undefined ? null : parseInt(threads, 10),
    blockSize: parseInt(block, 10),
    date: `${year}-${month}-${day}`,
    time,
  };
}
