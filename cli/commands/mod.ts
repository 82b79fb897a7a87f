/**
 * Command dispatcher for the sweep CLI.
 *
 * @module
 */

import type { Operation } from "effection";
import { helpCommand } from "./help.ts";
import { listProfilesCommand } from "./list-profiles.ts";
import { runCommand } from "./run.ts";
import { statusCommand } from "./status.ts";

/**
 * Takes the arguments after the command name and returns an exit code.
 */
export type CommandHandler = (args: string[]) => Operation<number>;

const COMMANDS = new Map<string, CommandHandler>([
  ["run", runCommand],
  ["list-profiles", listProfilesCommand],
  ["status", statusCommand],
  ["help", helpCommand],
]);

const HELP_FLAGS = new Set(["--help", "-h"]);

/**
 * Dispatch `args` (e.g. `["run", "--jits", "TCC", "GCC"]`) to a command.
 * `--help` anywhere after a command shows that command's help.
 */
export function* dispatch(args: string[]): Operation<number> {
  const [command, ...rest] = args;

  if (command === undefined || HELP_FLAGS.has(command)) {
    return yield* helpCommand([]);
  }

  const handler = COMMANDS.get(command);
  if (!handler) {
    console.error(`Unknown command: ${command}`);
    console.log();
    yield* helpCommand([]);
    return 1;
  }

  if (rest.some((arg) => HELP_FLAGS.has(arg))) {
    return yield* helpCommand([command]);
  }

  return yield* handler(rest);
}
