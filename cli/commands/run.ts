/**
 * run command implementation.
 *
 * Sweeps every examples profile × ETISS variant pair given on the command
 * line. Each pair runs its own inner cross product of programs, JITs,
 * fast JITs, optimization thread counts and block sizes.
 *
 * @module
 */

import { resolve } from "node:path";
import type { Operation } from "effection";
import { z } from "zod";
import { parseArgs, type OptionSpecs } from "../lib/args.ts";
import { type EtissVariant, toVariant } from "../lib/configuration.ts";
import {
  type Environment,
  PROJECT_ROOT,
  resolveEnvironment,
  resolvePaths,
  snapshotEnv,
} from "../lib/environment.ts";
import { createBenchmarkRunner } from "../lib/invoker.ts";
import { none, type Optional, some } from "../lib/optional.ts";
import { type CommandRunner, processRunner } from "../lib/process.ts";
import { createProfileRegistry } from "../lib/registry.ts";
import { toError, wrapResult } from "../lib/result.ts";
import {
  type BenchmarkResult,
  GccOptLevelSchema,
  type JitKind,
  JitKindSchema,
  LlvmOptLevelSchema,
  NO_FAST_JIT,
} from "../lib/schema.ts";
import type { StatsFileNamer } from "../lib/stats-file.ts";
import { multiArtifact, saveResults } from "../lib/store.ts";
import { runSweep } from "../lib/sweep.ts";

/**
 * Options accepted by `run`.
 */
export const RUN_OPTIONS: OptionSpecs = {
  programs: { kind: "list", alias: "p" },
  profile: { kind: "list" },
  "etiss-variant": { kind: "list" },
  jits: { kind: "list" },
  "block-sizes": { kind: "list" },
  "gcc-opt-level": { kind: "value" },
  "llvm-opt-level": { kind: "value" },
  "fast-jits": { kind: "list" },
  "optimization-threads": { kind: "list" },
  rebuild: { kind: "switch" },
  "rebuild-etiss": { kind: "switch" },
  output: { kind: "value", alias: "o" },
  "experiment-name": { kind: "value" },
};

const names = z.array(z.string().min(1)).min(1);

export const RunOptionsSchema = z.object({
  programs: names.default(["hello_world"]),
  profile: names.default(["default"]),
  "etiss-variant": names.default(["default"]),
  jits: z.array(JitKindSchema).min(1).default(["TCC"]),
  "block-sizes": z.array(z.coerce.number().int().positive()).min(1).default([100]),
  "gcc-opt-level": GccOptLevelSchema.default("3"),
  "llvm-opt-level": LlvmOptLevelSchema.default("3"),
  "fast-jits": z.array(z.union([JitKindSchema, z.literal(NO_FAST_JIT)])).min(1).optional(),
  "optimization-threads": z.array(z.coerce.number().int().nonnegative()).min(1).optional(),
  rebuild: z.boolean().default(false),
  "rebuild-etiss": z.boolean().default(false),
  output: z.string().min(1).optional(),
  "experiment-name": z
    .string()
    .regex(/^[\w.-]+$/, "must contain only letters, digits, '.', '_' or '-'")
    .optional(),
});

export type RunOptions = z.infer<typeof RunOptionsSchema>;

/**
 * Everything `run` needs from its surroundings.
 */
export interface RunDeps {
  exec: CommandRunner;
  baseEnv: Environment;
  projectRoot: string;
  /** Base for a relative --output path */
  cwd: string;
  namer?: StatsFileNamer;
}

/**
 * Parse and validate `run` arguments. Returns either options or a
 * printable error summary.
 */
export function parseRunOptions(
  args: string[],
): { ok: true; options: RunOptions } | { ok: false; summary: string } {
  const parsed = parseArgs(args, RUN_OPTIONS);
  const problems = [...parsed.errors];
  if (parsed.positionals.length > 0) {
    problems.push(`Unexpected argument(s): ${parsed.positionals.join(" ")}`);
  }

  const raw: Record<string, unknown> = {};
  for (const [name, values] of Object.entries(parsed.values)) {
    raw[name] = RUN_OPTIONS[name].kind === "list" ? values : values[0];
  }
  for (const name of parsed.switches) {
    raw[name] = true;
  }

  const result = RunOptionsSchema.safeParse(raw);
  if (!result.success) {
    for (const issue of result.error.issues) {
      problems.push(`--${issue.path[0]}: ${issue.message}`);
    }
  }

  if (problems.length > 0 || !result.success) {
    return { ok: false, summary: problems.map((p) => `  ${p}`).join("\n") };
  }
  return { ok: true, options: result.data };
}

/**
 * Map `--fast-jits` values onto an axis; "None" runs without a fast JIT.
 */
export function toFastJits(
  values: readonly (JitKind | typeof NO_FAST_JIT)[] | undefined,
): Optional<JitKind>[] | undefined {
  return values?.map((value) => (value === NO_FAST_JIT ? none : some(value)));
}

function header(text: string): void {
  console.log(`\n${"=".repeat(60)}`);
  console.log(text);
  console.log(`${"=".repeat(60)}\n`);
}

function unique<T>(values: readonly T[]): T[] {
  return [...new Set(values)];
}

/**
 * Execute a validated run. Returns the process exit code: 0 once every
 * sweep has been attempted, whether or not each combination succeeded.
 */
export function* executeRun(options: RunOptions, deps: RunDeps): Operation<number> {
  const env = yield* resolveEnvironment({
    configFile: resolvePaths(deps.baseEnv, deps.projectRoot).envConfig,
    baseEnv: deps.baseEnv,
    runner: deps.exec,
  });
  const paths = resolvePaths(env, deps.projectRoot);
  const registry = createProfileRegistry(paths);

  // Unknown profiles fail the invocation before anything runs
  const profiles = unique(options.profile);
  const variants: EtissVariant[] = [];
  let unknown = 0;
  for (const profile of profiles) {
    if (!(yield* registry.getProfile(profile, "examples"))) unknown++;
  }
  for (const name of unique(options["etiss-variant"].map((v) => toVariant(v).canonical))) {
    const variant = toVariant(name);
    if (!(yield* registry.getProfile(variant.canonical, "etiss"))) unknown++;
    variants.push(variant);
  }
  if (unknown > 0) {
    console.error(`\n${unknown} unknown profile(s); run 'etiss-sweep list-profiles' to see the catalogs`);
    return 1;
  }

  const runner = createBenchmarkRunner({
    paths,
    env,
    exec: deps.exec,
    experimentName: options["experiment-name"],
    namer: deps.namer,
  });

  if (options["rebuild-etiss"]) {
    for (const variant of variants) {
      const built = yield* wrapResult(variant.canonical, runner.buildEtiss(variant, true));
      if (!built.ok) {
        console.error(`Failed to build ETISS variant '${built.context}': ${built.error.message}`);
        return 1;
      }
    }
  }

  const request = {
    programs: options.programs,
    jits: options.jits,
    blockSizes: options["block-sizes"],
    fastJits: toFastJits(options["fast-jits"]),
    optimizationThreads: options["optimization-threads"],
    rebuild: options.rebuild,
  };

  const allResults: BenchmarkResult[] = [];
  let attempted = 0;
  let failed = 0;

  for (const variant of variants) {
    for (const profile of profiles) {
      header(`Testing profile: ${profile}, ETISS variant: ${variant.display}`);

      const outcome = yield* runSweep(runner, {
        profile,
        variant,
        gccOptLevel: options["gcc-opt-level"],
        llvmOptLevel: options["llvm-opt-level"],
      }, request);

      allResults.push(...outcome.results);
      attempted += outcome.attempted;
      failed += outcome.failures.length;
    }
  }

  if (options.output) {
    const destination = resolve(deps.cwd, options.output);
    const artifact = multiArtifact(
      profiles,
      variants.map((v) => v.canonical),
      allResults,
    );
    const saved = yield* wrapResult(destination, saveResults(artifact, destination));
    if (!saved.ok) {
      console.error(`Failed to save results to ${saved.context}: ${saved.error.message}`);
      return 1;
    }
  }

  console.log(`\n${"=".repeat(60)}`);
  console.log(`Completed ${allResults.length} benchmark runs (${attempted} attempted, ${failed} failed)`);
  console.log(`  Profiles tested: ${profiles.join(", ")}`);
  console.log(`  ETISS variants tested: ${variants.map((v) => v.display).join(", ")}`);
  console.log(`  Stats directory: ${runner.statsDir}`);
  console.log("=".repeat(60));

  return 0;
}

/**
 * Run a benchmark sweep.
 */
export function* runCommand(args: string[]): Operation<number> {
  const parsed = parseRunOptions(args);
  if (!parsed.ok) {
    console.error("Error parsing arguments:");
    console.error(parsed.summary);
    return 1;
  }

  try {
    return yield* executeRun(parsed.options, {
      exec: processRunner,
      baseEnv: snapshotEnv(process.env),
      projectRoot: PROJECT_ROOT,
      cwd: process.cwd(),
    });
  } catch (error: unknown) {
    console.error(`Error: ${toError(error).message}`);
    return 1;
  }
}
