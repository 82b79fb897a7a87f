import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import type { Operation } from "effection";
import { type BenchmarkConfiguration, toVariant } from "../cli/lib/configuration.ts";
import type { ResolvedPaths } from "../cli/lib/environment.ts";
import { none } from "../cli/lib/optional.ts";
import type { CommandOptions, CommandResult, CommandRunner } from "../cli/lib/process.ts";

export interface RecordedCall {
  command: string;
  args: string[];
  opts?: CommandOptions;
}

export type FakeHandler = (call: RecordedCall) => Partial<CommandResult>;

/**
 * In-process CommandRunner that records every call.
 */
export function fakeRunner(
  handler: FakeHandler = () => ({}),
): CommandRunner & { calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  return {
    calls,
    *run(command, args, opts): Operation<CommandResult> {
      const call = { command, args: [...args], opts };
      calls.push(call);
      const result = handler(call);
      return { code: 0, stdout: "", stderr: "", ...result };
    },
  };
}

export function argValue(args: string[], flag: string): string | undefined {
  const i = args.indexOf(flag);
  return i === -1 ? undefined : args[i + 1];
}

export function writeJson(path: string, data: unknown): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(data));
}

export function testConfiguration(
  overrides: Partial<BenchmarkConfiguration> = {},
): BenchmarkConfiguration {
  return {
    program: "hello_world",
    profile: "default",
    variant: toVariant("default"),
    jit: "TCC",
    fastJit: none,
    blockSize: 100,
    optimizationThreads: none,
    gccOptLevel: "3",
    llvmOptLevel: "3",
    ...overrides,
  };
}

export function testPaths(root: string): ResolvedPaths {
  return {
    etissRoot: "/opt/etiss",
    examplesRoot: "/opt/examples",
    configDir: join(root, "config"),
    scriptsDir: join(root, "scripts"),
    resultsDir: join(root, "results"),
    envConfig: join(root, "config", "env.conf"),
    etissCatalog: join(root, "config", "etiss-builds.json"),
    examplesCatalog: join(root, "config", "example-builds.json"),
  };
}
