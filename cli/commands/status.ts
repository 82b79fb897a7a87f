/**
 * status command implementation.
 *
 * Shows the current state of collected JIT stats files.
 *
 * @module
 */

import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { call, type Operation } from "effection";
import { parseArgs } from "../lib/args.ts";
import { PROJECT_ROOT, resolvePaths, snapshotEnv } from "../lib/environment.ts";
import { isNotFound } from "../lib/fs.ts";
import { statsDirFor } from "../lib/invoker.ts";
import { parseStatsFilename, type StatsFileInfo } from "../lib/stats-file.ts";

/**
 * A stats file found on disk, with the experiment it belongs to.
 */
export interface StatsFileEntry {
  /** Experiment subdirectory, or null for the top level */
  experiment: string | null;
  filename: string;
  info: StatsFileInfo;
}

function* listJson(dir: string): Operation<{ files: string[]; dirs: string[] }> {
  const entries = yield* call(() => readdir(dir, { withFileTypes: true }));
  return {
    files: entries.filter((e) => e.isFile() && e.name.endsWith(".json")).map((e) => e.name),
    dirs: entries.filter((e) => e.isDirectory()).map((e) => e.name),
  };
}

/**
 * Collect stats files from a stats directory and, unless scoped to one
 * experiment, its experiment subdirectories. Unrecognized names are skipped.
 */
export function* collectStatsFiles(
  statsDir: string,
  experiment?: string,
): Operation<StatsFileEntry[]> {
  const top = yield* listJson(statsDir);
  const found: StatsFileEntry[] = [];

  const add = (dirExperiment: string | null, filename: string) => {
    const info = parseStatsFilename(filename);
    if (info) found.push({ experiment: dirExperiment, filename, info });
  };

  for (const filename of top.files) {
    add(experiment ?? null, filename);
  }
  if (!experiment) {
    for (const dir of top.dirs) {
      const nested = yield* listJson(join(statsDir, dir));
      for (const filename of nested.files) {
        add(dir, filename);
      }
    }
  }

  return found;
}

function countBy<T>(items: T[], key: (item: T) => string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    const k = key(item);
    counts.set(k, (counts.get(k) ?? 0) + 1);
  }
  return counts;
}

function sorted(values: Iterable<string>): string[] {
  return Array.from(new Set(values)).sort();
}

/**
 * Print a status report for the given entries.
 */
export function printStatus(entries: StatsFileEntry[]): void {
  const dates = entries.map((e) => e.info.date).sort();
  const programs = sorted(entries.map((e) => e.info.program));
  const jits = sorted(entries.map((e) => e.info.jit));
  const byProgramJit = countBy(entries, (e) => `${e.info.program}\0${e.info.jit}`);

  console.log("\nJIT Stats Status\n");
  console.log(`Total files: ${entries.length}`);
  console.log(`Date range: ${dates[0]} to ${dates[dates.length - 1]}`);
  console.log(`Programs: ${programs.join(", ")}`);
  console.log(`Profiles: ${sorted(entries.map((e) => e.info.profile)).join(", ")}`);
  console.log(`Variants: ${sorted(entries.map((e) => e.info.variant)).join(", ")}`);
  console.log(`JITs: ${jits.join(", ")}`);

  const experiments = sorted(
    entries.flatMap((e) => (e.experiment === null ? [] : [e.experiment])),
  );
  if (experiments.length > 0) {
    console.log(`Experiments: ${experiments.join(", ")}`);
  }

  console.log("\nFiles per program/JIT:\n");

  const width = Math.max(20, ...programs.map((p) => p.length + 2));
  console.log(`  ${"Program".padEnd(width)} ${jits.map((j) => j.padEnd(8)).join(" ")}`);
  console.log(`  ${"-".repeat(width)} ${jits.map(() => "-".repeat(8)).join(" ")}`);

  for (const program of programs) {
    const cells = jits.map((jit) => {
      const count = byProgramJit.get(`${program}\0${jit}`) ?? 0;
      return count > 0 ? String(count).padEnd(8) : "-".padEnd(8);
    });
    console.log(`  ${program.padEnd(width)} ${cells.join(" ")}`);
  }
}

/**
 * Show JIT stats status.
 */
export function* statusCommand(args: string[]): Operation<number> {
  const parsed = parseArgs(args, { "experiment-name": { kind: "value" } });
  if (parsed.errors.length > 0 || parsed.positionals.length > 0) {
    console.error("Error parsing arguments:");
    for (const error of parsed.errors) console.error(`  ${error}`);
    for (const arg of parsed.positionals) console.error(`  Unexpected argument: ${arg}`);
    return 1;
  }

  const experiment = parsed.values["experiment-name"]?.[0];
  const paths = resolvePaths(snapshotEnv(process.env), PROJECT_ROOT);
  const statsDir = statsDirFor(paths, experiment);

  let entries: StatsFileEntry[];
  try {
    entries = yield* collectStatsFiles(statsDir, experiment);
  } catch (error: unknown) {
    if (!isNotFound(error)) throw error;
    console.log(`No JIT stats found (${statsDir} missing)`);
    return 0;
  }

  if (entries.length === 0) {
    console.log(`No JIT stats files found in ${statsDir}`);
    return 0;
  }

  printStatus(entries);
  return 0;
}
