import { run } from "effection";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { dispatch } from "../cli/commands/mod.ts";

describe("dispatch", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function printed(): string {
    return vi.mocked(console.log).mock.calls.map((call) => String(call[0])).join("\n");
  }

  it("shows general help without a command", async () => {
    expect(await run(() => dispatch([]))).toBe(0);
    expect(printed()).toMatch(/^ETISS benchmark sweep CLI/);
  });

  it("shows command help for --help after a command", async () => {
    expect(await run(() => dispatch(["status", "--help"]))).toBe(0);
    expect(printed()).toMatch(/^etiss-sweep status - /);
  });

  it("names the build and run scripts in run help", async () => {
    expect(await run(() => dispatch(["run", "--help"]))).toBe(0);
    expect(printed()).toContain("scripts/run-benchmark.sh");
  });

  it("rejects an unknown command", async () => {
    expect(await run(() => dispatch(["bogus"]))).toBe(1);
    expect(console.error).toHaveBeenCalledWith("Unknown command: bogus");
  });

  it("reports argument errors from run", async () => {
    expect(await run(() => dispatch(["run", "--jits", "JVM"]))).toBe(1);
    expect(console.error).toHaveBeenCalledWith("Error parsing arguments:");
  });
});
