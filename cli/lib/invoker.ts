/**
 * Run invoker.
 *
 * Wraps the external build and run scripts. Each call blocks until the
 * script exits; a non-zero exit raises {@link RunFailedError} carrying
 * the captured output. Nothing is retried.
 *
 * @module
 */

import { join } from "node:path";
import type { Operation } from "effection";
import type { BenchmarkConfiguration, EtissVariant } from "./configuration.ts";
import type { Environment, ResolvedPaths } from "./environment.ts";
import { RunFailedError } from "./errors.ts";
import { ensureDir } from "./fs.ts";
import { type CommandResult, type CommandRunner, formatCommand } from "./process.ts";
import { StatsFileNamer } from "./stats-file.ts";

/**
 * Output of one benchmark run, before extraction.
 */
export interface RawPayload {
  configuration: BenchmarkConfiguration;
  /** Rendered command line */
  command: string;
  /** Where the run script was asked to write its JSON stats */
  statsPath: string;
  stdout: string;
  stderr: string;
}

export interface RunnerContext {
  paths: ResolvedPaths;
  /** Merged environment handed to every script */
  env: Environment;
  exec: CommandRunner;
  /** Groups stats files under results/jit_stats/<name> */
  experimentName?: string;
  namer?: StatsFileNamer;
}

export interface BenchmarkRunner {
  /** Directory stats files are written to */
  readonly statsDir: string;
  buildEtiss(variant: EtissVariant, clean: boolean): Operation<void>;
  buildProgram(profile: string, program: string, clean: boolean): Operation<void>;
  run(configuration: BenchmarkConfiguration): Operation<RawPayload>;
}

/**
 * Build the run-benchmark.sh arguments for a configuration.
 */
export function buildRunArgs(
  config: BenchmarkConfiguration,
  statsPath: string,
): string[] {
  const args = [
    "--program", config.program,
    "--profile", config.profile,
    "--etiss-variant", config.variant.canonical,
    "--jit", config.jit,
    "--block-size", String(config.blockSize),
    "--gcc-opt-level", config.gccOptLevel,
    "--llvm-opt-level", config.llvmOptLevel,
    "--jit-stats-json", statsPath,
  ];
  if (config.fastJit.present) {
    args.push("--fast-jit", config.fastJit.value);
  }
  if (config.optimizationThreads.present) {
    args.push("--optimization-threads", String(config.optimizationThreads.value));
  }
  return args;
}

/**
 * Resolve the stats directory for an optional experiment name.
 */
export function statsDirFor(paths: ResolvedPaths, experimentName?: string): string {
  const base = join(paths.resultsDir, "jit_stats");
  return experimentName ? join(base, experimentName) : base;
}

export function createBenchmarkRunner(context: RunnerContext): BenchmarkRunner {
  const { paths, exec } = context;
  const namer = context.namer ?? new StatsFileNamer();
  const statsDir = statsDirFor(paths, context.experimentName);
  const env: Environment = {
    ...context.env,
    ETISS_ROOT: paths.etissRoot,
    EXAMPLES_ROOT: paths.examplesRoot,
  };

  function* invoke(script: string, args: string[]): Operation<CommandResult> {
    const command = join(paths.scriptsDir, script);
    const result = yield* exec.run(command, args, { env });
    if (result.code !== 0) {
      throw new RunFailedError({
        command: formatCommand(command, args),
        code: result.code,
        stdout: result.stdout,
        stderr: result.stderr,
      });
    }
    return result;
  }

  return {
    statsDir,

    *buildEtiss(variant, clean) {
      const args = ["--variant", variant.canonical];
      if (clean) args.push("--clean");

      console.log(`Building ETISS variant '${variant.canonical}'...`);
      yield* invoke("build-etiss.sh", args);
    },

    *buildProgram(profile, program, clean) {
      const args = ["--profile", profile, "--program", program];
      if (clean) args.push("--clean");

      console.log(`Building ${program} with profile '${profile}'...`);
      yield* invoke("build-examples.sh", args);
    },

    *run(configuration) {
      yield* ensureDir(statsDir);
      const statsPath = join(statsDir, namer.next(configuration));
      const args = buildRunArgs(configuration, statsPath);

      const result = yield* invoke("run-benchmark.sh", args);
      if (result.stderr) {
        console.log(`  [stderr]: ${result.stderr}`);
      }

      return {
        configuration,
        command: formatCommand(join(paths.scriptsDir, "run-benchmark.sh"), args),
        statsPath,
        stdout: result.stdout,
        stderr: result.stderr,
      };
    },
  };
}
