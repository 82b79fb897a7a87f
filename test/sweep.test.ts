import { run, type Operation } from "effection";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  type BenchmarkConfiguration,
  describeConfiguration,
  toVariant,
} from "../cli/lib/configuration.ts";
import { RunFailedError } from "../cli/lib/errors.ts";
import { buildResult, emptyMetrics } from "../cli/lib/extractor.ts";
import type { BenchmarkRunner, RawPayload } from "../cli/lib/invoker.ts";
import { none, some } from "../cli/lib/optional.ts";
import type { BenchmarkResult } from "../cli/lib/schema.ts";
import {
  enumerateSweep,
  runSweep,
  type SweepRequest,
  type SweepTarget,
  toAxes,
} from "../cli/lib/sweep.ts";

const target: SweepTarget = {
  profile: "default",
  variant: toVariant("default"),
  gccOptLevel: "3",
  llvmOptLevel: "3",
};

interface StubOptions {
  /** Fail the run of any configuration this returns true for */
  failRun?: (config: BenchmarkConfiguration) => boolean;
  /** Fail the build of these programs */
  failBuild?: string[];
}

function stubRunner(options: StubOptions = {}) {
  const runs: BenchmarkConfiguration[] = [];
  const builds: string[] = [];

  const runner: BenchmarkRunner = {
    statsDir: "/results/jit_stats",
    *buildEtiss() {},
    *buildProgram(_profile, program) {
      builds.push(program);
      if (options.failBuild?.includes(program)) {
        throw new RunFailedError({
          command: `build-examples.sh --program ${program}`,
          code: 2,
          stdout: "",
          stderr: "no such program",
        });
      }
    },
    *run(configuration) {
      runs.push(configuration);
      if (options.failRun?.(configuration)) {
        throw new RunFailedError({
          command: "run-benchmark.sh",
          code: 1,
          stdout: "partial output",
          stderr: "simulator crashed",
        });
      }
      return {
        configuration,
        command: "run-benchmark.sh",
        statsPath: `/results/jit_stats/${configuration.program}.json`,
        stdout: "",
        stderr: "",
      };
    },
  };

  return { runner, runs, builds };
}

function* metricsFromBlockSize(payload: RawPayload): Operation<BenchmarkResult> {
  const metrics = emptyMetrics();
  metrics.mips_estimated = payload.configuration.blockSize / 10;
  return buildResult(payload.configuration, metrics);
}

describe("enumerateSweep", () => {
  it("iterates programs outermost and block sizes innermost", () => {
    const points = enumerateSweep(
      toAxes({
        programs: ["hello_world", "dhry"],
        jits: ["TCC", "GCC"],
        blockSizes: [50, 100],
      }),
    );

    expect(points.map((p) => `${p.program}/${p.jit}/${p.blockSize}`)).toEqual([
      "hello_world/TCC/50",
      "hello_world/TCC/100",
      "hello_world/GCC/50",
      "hello_world/GCC/100",
      "dhry/TCC/50",
      "dhry/TCC/100",
      "dhry/GCC/50",
      "dhry/GCC/100",
    ]);
  });

  it("has one point per element of the cross product", () => {
    const request: SweepRequest = {
      programs: ["a", "b"],
      jits: ["TCC", "GCC", "LLVM"],
      blockSizes: [10, 100],
      fastJits: [none, some("TCC")],
      optimizationThreads: [1, 2, 4],
    };
    expect(enumerateSweep(toAxes(request))).toHaveLength(2 * 3 * 2 * 3 * 2);
  });

  it("treats absent optional axes as a single unset element", () => {
    const [point, ...rest] = enumerateSweep(
      toAxes({ programs: ["hello_world"], jits: ["TCC"], blockSizes: [100] }),
    );
    expect(rest).toHaveLength(0);
    expect(point.fastJit).toEqual(none);
    expect(point.optimizationThreads).toEqual(none);
  });

  it("nests fast JITs and thread counts between JIT and block size", () => {
    const points = enumerateSweep(
      toAxes({
        programs: ["p"],
        jits: ["LLVM"],
        blockSizes: [1, 2],
        fastJits: [some("TCC")],
        optimizationThreads: [4, 8],
      }),
    );
    expect(points.map((p) => describeConfiguration({
      program: p.program,
      profile: "default",
      variant: toVariant("default"),
      jit: p.jit,
      fastJit: p.fastJit,
      blockSize: p.blockSize,
      optimizationThreads: p.optimizationThreads,
      gccOptLevel: "3",
      llvmOptLevel: "3",
    }))).toEqual([
      "p (JIT: LLVM, fast: TCC, threads: 4, block: 1)",
      "p (JIT: LLVM, fast: TCC, threads: 4, block: 2)",
      "p (JIT: LLVM, fast: TCC, threads: 8, block: 1)",
      "p (JIT: LLVM, fast: TCC, threads: 8, block: 2)",
    ]);
  });

  it("rejects an empty required axis", () => {
    expect(() => toAxes({ programs: [], jits: ["TCC"], blockSizes: [100] })).toThrow(
      'Sweep axis "programs" must not be empty',
    );
  });
});

describe("runSweep", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns results in iteration order", async () => {
    const { runner, runs } = stubRunner();

    const outcome = await run(() =>
      runSweep(runner, target, {
        programs: ["hello_world"],
        jits: ["TCC"],
        blockSizes: [50, 100],
      }, metricsFromBlockSize)
    );

    expect(runs.map((c) => c.blockSize)).toEqual([50, 100]);
    expect(outcome.attempted).toBe(2);
    expect(outcome.failures).toEqual([]);
    expect(outcome.results.map((r) => [r.block_size, r.mips_estimated])).toEqual([
      [50, 5],
      [100, 10],
    ]);
    expect(outcome.results[0]).toMatchObject({
      program: "hello_world",
      profile: "default",
      etiss_variant: "etiss_default",
      jit: "TCC",
      fast_jit: null,
      optimization_threads: null,
    });
  });

  it("skips a failing combination and keeps going", async () => {
    const { runner, runs } = stubRunner({
      failRun: (config) => config.jit === "GCC" && config.blockSize === 50,
    });

    const outcome = await run(() =>
      runSweep(runner, target, {
        programs: ["hello_world"],
        jits: ["TCC", "GCC"],
        blockSizes: [50, 100],
      }, metricsFromBlockSize)
    );

    expect(runs).toHaveLength(4);
    expect(outcome.attempted).toBe(4);
    expect(outcome.results.map((r) => `${r.jit}/${r.block_size}`)).toEqual([
      "TCC/50",
      "TCC/100",
      "GCC/100",
    ]);
    expect(outcome.failures).toHaveLength(1);
    expect(outcome.failures[0].context).toBe(
      "hello_world (JIT: GCC, block: 50) [profile: default, variant: default]",
    );
    expect(console.error).toHaveBeenCalledWith(
      "  → FAILED: hello_world (JIT: GCC, block: 50) [profile: default, variant: default]: Command failed (exit code 1): run-benchmark.sh",
    );
    expect(console.error).toHaveBeenCalledWith("  → Error output: simulator crashed");
    expect(console.error).toHaveBeenCalledWith("  → Standard output: partial output");
  });

  it("counts extraction errors as failures", async () => {
    const { runner } = stubRunner();

    const outcome = await run(() =>
      runSweep(runner, target, {
        programs: ["hello_world"],
        jits: ["TCC"],
        blockSizes: [100],
      }, function* () {
        throw new Error("unreadable stats");
      })
    );

    expect(outcome.results).toEqual([]);
    expect(outcome.failures.map((f) => f.error.message)).toEqual(["unreadable stats"]);
  });

  it("rebuilds each program once when asked", async () => {
    const { runner, builds, runs } = stubRunner();

    const outcome = await run(() =>
      runSweep(runner, target, {
        programs: ["hello_world", "dhry"],
        jits: ["TCC", "GCC"],
        blockSizes: [100],
        rebuild: true,
      }, metricsFromBlockSize)
    );

    expect(builds).toEqual(["hello_world", "dhry"]);
    expect(runs).toHaveLength(4);
    expect(outcome.results).toHaveLength(4);
  });

  it("does not build without the rebuild flag", async () => {
    const { runner, builds } = stubRunner();

    await run(() =>
      runSweep(runner, target, {
        programs: ["hello_world"],
        jits: ["TCC"],
        blockSizes: [100],
      }, metricsFromBlockSize)
    );

    expect(builds).toEqual([]);
  });

  it("fails every combination of a program whose build fails", async () => {
    const { runner, builds, runs } = stubRunner({ failBuild: ["broken"] });

    const outcome = await run(() =>
      runSweep(runner, target, {
        programs: ["broken", "hello_world"],
        jits: ["TCC"],
        blockSizes: [50, 100],
        rebuild: true,
      }, metricsFromBlockSize)
    );

    expect(builds).toEqual(["broken", "hello_world"]);
    expect(runs.map((c) => c.program)).toEqual(["hello_world", "hello_world"]);
    expect(outcome.attempted).toBe(4);
    expect(outcome.results).toHaveLength(2);
    expect(outcome.failures.map((f) => f.context)).toEqual([
      "broken (JIT: TCC, block: 50) [profile: default, variant: default]",
      "broken (JIT: TCC, block: 100) [profile: default, variant: default]",
    ]);
    expect(outcome.failures[0].error).toBeInstanceOf(RunFailedError);
  });
});
