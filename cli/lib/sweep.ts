/**
 * Sweep driver.
 *
 * Runs the cross product of programs, JITs, fast JITs, optimization
 * thread counts and block sizes against one profile/variant pair, one
 * combination at a time. Iteration order is fixed, outermost first:
 * (program, jit, fastJit, optimizationThreads, blockSize). Downstream
 * tooling correlates runs by that sequence.
 *
 * A failing combination is logged and skipped; it never stops the sweep.
 *
 * @module
 */

import type { Operation } from "effection";
import {
  type BenchmarkConfiguration,
  describeConfiguration,
  type EtissVariant,
} from "./configuration.ts";
import { RunFailedError } from "./errors.ts";
import { extractResult } from "./extractor.ts";
import type { BenchmarkRunner, RawPayload } from "./invoker.ts";
import { type Axis, axisOf, none, type Optional, some } from "./optional.ts";
import { type Failure, failed, partition, type Result, wrapResult } from "./result.ts";
import type { BenchmarkResult, GccOptLevel, JitKind, LlvmOptLevel } from "./schema.ts";

/**
 * Axis lists as supplied by the user. Optional axes may be omitted.
 */
export interface SweepRequest {
  programs: readonly string[];
  jits: readonly JitKind[];
  blockSizes: readonly number[];
  /** `none` entries run without a fast JIT */
  fastJits?: readonly Optional<JitKind>[];
  optimizationThreads?: readonly number[];
  /** Clean-rebuild each program once before its first combination */
  rebuild?: boolean;
}

export interface SweepAxes {
  programs: Axis<string>;
  jits: Axis<JitKind>;
  fastJits: Axis<Optional<JitKind>>;
  optimizationThreads: Axis<Optional<number>>;
  blockSizes: Axis<number>;
}

export interface SweepPoint {
  program: string;
  jit: JitKind;
  fastJit: Optional<JitKind>;
  optimizationThreads: Optional<number>;
  blockSize: number;
}

/**
 * Fixed part of every configuration in one sweep.
 */
export interface SweepTarget {
  profile: string;
  variant: EtissVariant;
  gccOptLevel: GccOptLevel;
  llvmOptLevel: LlvmOptLevel;
}

export interface SweepOutcome {
  /** Size of the cross product */
  attempted: number;
  /** Successful results in iteration order */
  results: BenchmarkResult[];
  failures: Failure[];
}

/**
 * Turns a run's raw payload into a result. Defaults to {@link extractResult}.
 */
export type Extractor = (payload: RawPayload) => Operation<BenchmarkResult>;

function required<T>(name: string, values: readonly T[]): Axis<T> {
  if (values.length === 0) {
    throw new Error(`Sweep axis "${name}" must not be empty`);
  }
  const [first, ...rest] = values;
  return [first, ...rest];
}

/**
 * Normalize a request into non-empty axes. Absent optional axes become a
 * single "unset" element so the cross product is always well defined.
 */
export function toAxes(request: SweepRequest): SweepAxes {
  return {
    programs: required("programs", request.programs),
    jits: required("jits", request.jits),
    fastJits: axisOf(request.fastJits, none),
    optimizationThreads: axisOf(request.optimizationThreads?.map((n) => some(n)), none),
    blockSizes: required("blockSizes", request.blockSizes),
  };
}

/**
 * Enumerate every sweep point in iteration order.
 */
export function enumerateSweep(axes: SweepAxes): SweepPoint[] {
  const points: SweepPoint[] = [];
  for (const program of axes.programs) {
    for (const jit of axes.jits) {
      for (const fastJit of axes.fastJits) {
        for (const optimizationThreads of axes.optimizationThreads) {
          for (const blockSize of axes.blockSizes) {
            points.push({ program, jit, fastJit, optimizationThreads, blockSize });
          }
        }
      }
    }
  }
  return points;
}

export function toConfiguration(target: SweepTarget, point: SweepPoint): BenchmarkConfiguration {
  return {
    program: point.program,
    profile: target.profile,
    variant: target.variant,
    jit: point.jit,
    fastJit: point.fastJit,
    blockSize: point.blockSize,
    optimizationThreads: point.optimizationThreads,
    gccOptLevel: target.gccOptLevel,
    llvmOptLevel: target.llvmOptLevel,
  };
}

function reportFailure(context: string, error: Error): void {
  console.error(`  → FAILED: ${context}: ${error.message}`);
  if (error instanceof RunFailedError) {
    if (error.stderr) {
      console.error(`  → Error output: ${error.stderr}`);
    }
    if (error.stdout) {
      console.error(`  → Standard output: ${error.stdout}`);
    }
  }
}

function reportSuccess(result: BenchmarkResult): void {
  console.log(
    `  → MIPS (estimated): ${result.mips_estimated.toFixed(4)}, MIPS (corrected): ${result.mips_corrected.toFixed(4)}, Wall time: ${result.wall_time.toFixed(4)}s`,
  );
}

/**
 * Run one sweep. Returns successful results in iteration order together
 * with every failure; `results.length + failures.length === attempted`.
 */
export function* runSweep(
  runner: BenchmarkRunner,
  target: SweepTarget,
  request: SweepRequest,
  extract: Extractor = extractResult,
): Operation<SweepOutcome> {
  const points = enumerateSweep(toAxes(request));
  const outcomes: Result<BenchmarkResult>[] = [];
  const builds = new Map<string, Result<void>>();

  for (const point of points) {
    const configuration = toConfiguration(target, point);
    const context = `${describeConfiguration(configuration)} [profile: ${target.profile}, variant: ${target.variant.display}]`;

    if (request.rebuild) {
      let build = builds.get(point.program);
      if (!build) {
        build = yield* wrapResult(
          `build ${point.program}`,
          runner.buildProgram(target.profile, point.program, true),
        );
        builds.set(point.program, build);
        if (!build.ok) {
          reportFailure(build.context, build.error);
        }
      }
      if (!build.ok) {
        outcomes.push(failed(context, build.error));
        continue;
      }
    }

    console.log(`Running ${describeConfiguration(configuration)}...`);
    const outcome = yield* wrapResult(context, runCombination(runner, configuration, extract));
    if (outcome.ok) {
      reportSuccess(outcome.value);
    } else {
      reportFailure(outcome.context, outcome.error);
    }
    outcomes.push(outcome);
  }

  const { values, failures } = partition(outcomes);
  return { attempted: points.length, results: values, failures };
}

function* runCombination(
  runner: BenchmarkRunner,
  configuration: BenchmarkConfiguration,
  extract: Extractor,
): Operation<BenchmarkResult> {
  const payload = yield* runner.run(configuration);
  return yield* extract(payload);
}
