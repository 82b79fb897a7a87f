import { existsSync } from "node:fs";
import { join } from "node:path";
import { run } from "effection";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { toVariant } from "../cli/lib/configuration.ts";
import { RunFailedError } from "../cli/lib/errors.ts";
import { buildRunArgs, createBenchmarkRunner, statsDirFor } from "../cli/lib/invoker.ts";
import { some } from "../cli/lib/optional.ts";
import { StatsFileNamer } from "../cli/lib/stats-file.ts";
import { useTempDir } from "../cli/lib/temp-dir.ts";
import { argValue, fakeRunner, testConfiguration, testPaths } from "./helpers.ts";

const at = new Date(2025, 0, 15, 9, 5, 7);

describe("buildRunArgs", () => {
  it("passes the canonical variant and every required flag", () => {
    const args = buildRunArgs(testConfiguration(), "/stats/run.json");
    expect(args).toEqual([
      "--program", "hello_world",
      "--profile", "default",
      "--etiss-variant", "etiss_default",
      "--jit", "TCC",
      "--block-size", "100",
      "--gcc-opt-level", "3",
      "--llvm-opt-level", "3",
      "--jit-stats-json", "/stats/run.json",
    ]);
  });

  it("appends optional flags only when set", () => {
    const args = buildRunArgs(
      testConfiguration({
        jit: "LLVM",
        fastJit: some("TCC"),
        optimizationThreads: some(4),
        llvmOptLevel: "z",
      }),
      "/stats/run.json",
    );
    expect(args.slice(-4)).toEqual(["--fast-jit", "TCC", "--optimization-threads", "4"]);
    expect(argValue(args, "--llvm-opt-level")).toBe("z");
  });

  it("passes a thread count even without a fast JIT", () => {
    const args = buildRunArgs(testConfiguration({ optimizationThreads: some(2) }), "/s.json");
    expect(argValue(args, "--optimization-threads")).toBe("2");
    expect(args).not.toContain("--fast-jit");
  });
});

describe("statsDirFor", () => {
  it("nests experiments under jit_stats", () => {
    const paths = testPaths("/project");
    expect(statsDirFor(paths)).toBe("/project/results/jit_stats");
    expect(statsDirFor(paths, "baseline")).toBe("/project/results/jit_stats/baseline");
  });
});

describe("createBenchmarkRunner", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("runs the benchmark script with roots exported", async () => {
    const exec = fakeRunner(() => ({ stdout: "MIPS (estimated): 1.5\n" }));

    const { payload, statsDir, root } = await run(function* () {
      const root = yield* useTempDir();
      const runner = createBenchmarkRunner({
        paths: testPaths(root),
        env: { PATH: "/usr/bin", ETISS_ROOT: "/stale" },
        exec,
        experimentName: "baseline",
        namer: new StatsFileNamer(() => at),
      });
      const payload = yield* runner.run(testConfiguration());
      return { payload, statsDir: runner.statsDir, root };
    });

    expect(statsDir).toBe(join(root, "results", "jit_stats", "baseline"));
    expect(payload.statsPath).toBe(
      join(statsDir, "hello_world_profile-default_variant-default_jit-TCC_block-100_20250115_090507.json"),
    );
    expect(payload.stdout).toBe("MIPS (estimated): 1.5\n");

    const [call] = exec.calls;
    expect(call.command).toBe(join(root, "scripts", "run-benchmark.sh"));
    expect(argValue(call.args, "--jit-stats-json")).toBe(payload.statsPath);
    expect(call.opts?.env).toEqual({
      PATH: "/usr/bin",
      ETISS_ROOT: "/opt/etiss",
      EXAMPLES_ROOT: "/opt/examples",
    });
  });

  it("creates the stats directory before running", async () => {
    const created = await run(function* () {
      const root = yield* useTempDir();
      const runner = createBenchmarkRunner({
        paths: testPaths(root),
        env: {},
        exec: fakeRunner(),
      });
      yield* runner.run(testConfiguration());
      return existsSync(join(root, "results", "jit_stats"));
    });
    expect(created).toBe(true);
  });

  it("raises RunFailedError with the captured output", async () => {
    const exec = fakeRunner(() => ({ code: 3, stdout: "partial", stderr: "boom" }));

    const error = await run(function* () {
      const root = yield* useTempDir();
      const runner = createBenchmarkRunner({ paths: testPaths(root), env: {}, exec });
      try {
        yield* runner.run(testConfiguration());
      } catch (error: unknown) {
        return error;
      }
      return undefined;
    });

    expect(error).toBeInstanceOf(RunFailedError);
    expect(error).toMatchObject({ code: 3, stdout: "partial", stderr: "boom" });
  });

  it("builds variants and programs through the build scripts", async () => {
    const exec = fakeRunner();
    const paths = testPaths("/project");
    const runner = createBenchmarkRunner({ paths, env: {}, exec });

    await run(function* () {
      yield* runner.buildEtiss(toVariant("tcc"), true);
      yield* runner.buildProgram("scalar", "dhry", false);
    });

    expect(exec.calls.map((c) => [c.command, c.args])).toEqual([
      ["/project/scripts/build-etiss.sh", ["--variant", "etiss_tcc", "--clean"]],
      ["/project/scripts/build-examples.sh", ["--profile", "scalar", "--program", "dhry"]],
    ]);
  });
});
