/**
 * Subprocess execution for external collaborators.
 *
 * @module
 */

import { exec } from "@effectionx/process";
import type { Operation } from "effection";

/**
 * Options for a single command invocation.
 */
export interface CommandOptions {
  /** Working directory for the subprocess */
  cwd?: string;
  /** Full environment of the subprocess */
  env?: Record<string, string>;
}

/**
 * Captured outcome of a finished command.
 */
export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs a command to completion and captures its output.
 * Never throws for a non-zero exit; callers decide.
 */
export interface CommandRunner {
  run(
    command: string,
    args: readonly string[],
    opts?: CommandOptions,
  ): Operation<CommandResult>;
}

/**
 * Render a command line for logs and error messages.
 */
export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args]
    .map((part) => (/^[\w./=:+-]+$/.test(part) ? part : JSON.stringify(part)))
    .join(" ");
}

/**
 * CommandRunner backed by @effectionx/process.
 */
export const processRunner: CommandRunner = {
  *run(command, args, opts = {}): Operation<CommandResult> {
    const result = yield* exec(command, {
      arguments: [...args],
      cwd: opts.cwd,
      env: opts.env,
    }).join();

    return {
      code: result.code ?? 1,
      stdout: result.stdout,
      stderr: result.stderr,
    };
  },
};
