/**
 * Help command implementation.
 *
 * @module
 */

import type { Operation } from "effection";

const MAIN_HELP = `
ETISS benchmark sweep CLI

Usage: etiss-sweep <command> [options]

Commands:
  run             Run a benchmark sweep
  list-profiles   List examples build profiles and ETISS variants
  status          Summarize collected JIT stats files
  help            Show this help message

Run 'etiss-sweep help <command>' for command-specific help.

Examples:
  etiss-sweep run --programs dhry coremark --jits TCC GCC --block-sizes 50 100
  etiss-sweep list-profiles
  etiss-sweep status --experiment-name decoder
`.trim();

const RUN_HELP = `
etiss-sweep run - Run a benchmark sweep

Usage:
  etiss-sweep run [options]

Every option marked (list) takes one or more values and may be repeated.
Several profiles or variants run one sweep per profile/variant pair.

Builds and runs go through scripts/build-etiss.sh, scripts/build-examples.sh
and scripts/run-benchmark.sh, which are not shipped with this tool. Put
them in scripts/ first; without them every combination fails to start.

Options:
  --programs, -p          Programs to run (list, default: hello_world)
  --profile               Examples build profile(s) (list, default: default)
  --etiss-variant         ETISS build variant(s) (list, default: default)
  --jits                  JIT compilers: GCC, TCC, LLVM (list, default: TCC)
  --block-sizes           Block sizes (list, default: 100)
  --gcc-opt-level         GCC JIT optimization level: 0 1 2 3 s fast (default: 3)
  --llvm-opt-level        LLVM JIT optimization level: 0 1 2 3 s z fast (default: 3)
  --fast-jits             Fast JIT compilers, "None" to run without one (list)
  --optimization-threads  Background optimization thread counts (list)
  --rebuild               Clean-rebuild each program before its first run
  --rebuild-etiss         Clean-rebuild each ETISS variant before the sweep
  --output, -o            Write all results to this JSON file
  --experiment-name       Group stats files under results/jit_stats/<name>

Examples:
  etiss-sweep run --programs dhry --jits TCC GCC LLVM
  etiss-sweep run -p dhry --jits LLVM --fast-jits TCC None --optimization-threads 1 2 4
  etiss-sweep run --profile default scalar --etiss-variant default tcc -o results/sweep.json
`.trim();

const LIST_PROFILES_HELP = `
etiss-sweep list-profiles - List build profiles

Usage:
  etiss-sweep list-profiles

Shows the examples build profiles (config/example-builds.json) and the
ETISS build variants (config/etiss-builds.json) with their descriptions.
`.trim();

const STATUS_HELP = `
etiss-sweep status - Summarize collected JIT stats files

Usage:
  etiss-sweep status [--experiment-name <name>]

Shows:
  - Number of stats files per program and JIT
  - Variants and profiles covered
  - Date range of collected data

Options:
  --experiment-name   Only look at results/jit_stats/<name>
`.trim();

const COMMAND_HELP: Record<string, string> = {
  run: RUN_HELP,
  "list-profiles": LIST_PROFILES_HELP,
  status: STATUS_HELP,
  help: MAIN_HELP,
};

/**
 * Display help for a command or general usage.
 */
export function* helpCommand(args: string[]): Operation<number> {
  const subcommand = args[0];

  if (subcommand && COMMAND_HELP[subcommand]) {
    console.log(COMMAND_HELP[subcommand]);
  } else if (subcommand) {
    console.error(`Unknown command: ${subcommand}`);
    console.log();
    console.log(MAIN_HELP);
    return 1;
  } else {
    console.log(MAIN_HELP);
  }

  return 0;
}
