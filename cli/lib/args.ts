/**
 * Command-line argument parsing.
 *
 * Options are declared up front and values are collected as strings;
 * commands validate and convert them with zod. List options take every
 * value up to the next flag (`--jits TCC GCC`) and may also be repeated
 * (`--jits TCC --jits GCC`).
 *
 * @module
 */

export type OptionKind = "switch" | "value" | "list";

export interface OptionSpec {
  kind: OptionKind;
  alias?: string;
}

export type OptionSpecs = Record<string, OptionSpec>;

export interface ParsedArgs {
  /** Values of value and list options, keyed by long name */
  values: Record<string, string[]>;
  /** Switches that were given */
  switches: Set<string>;
  positionals: string[];
  errors: string[];
}

function isFlag(arg: string): boolean {
  return /^--?[a-zA-Z]/.test(arg);
}

/**
 * Split `--name=value` into its parts.
 */
function splitInline(arg: string): [string, string | undefined] {
  const eq = arg.indexOf("=");
  return eq === -1 ? [arg, undefined] : [arg.slice(0, eq), arg.slice(eq + 1)];
}

function resolveName(flag: string, specs: OptionSpecs): string | undefined {
  if (flag.startsWith("--")) {
    const name = flag.slice(2);
    return name in specs ? name : undefined;
  }
  const alias = flag.slice(1);
  return Object.keys(specs).find((name) => specs[name].alias === alias);
}

export function parseArgs(args: readonly string[], specs: OptionSpecs): ParsedArgs {
  const result: ParsedArgs = {
    values: {},
    switches: new Set(),
    positionals: [],
    errors: [],
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (!isFlag(arg)) {
      result.positionals.push(arg);
      continue;
    }

    const [flag, inline] = splitInline(arg);
    const name = resolveName(flag, specs);
    if (!name) {
      result.errors.push(`Unknown option: ${flag}`);
      continue;
    }

    const spec = specs[name];
    const values = (result.values[name] ??= []);

    switch (spec.kind) {
      case "switch":
        if (inline !== undefined) {
          result.errors.push(`Option ${flag} does not take a value`);
        }
        result.switches.add(name);
        break;
      case "value": {
        const value = inline ?? args[i + 1];
        if (value === undefined || (inline === undefined && isFlag(value))) {
          result.errors.push(`Option ${flag} requires a value`);
          break;
        }
        if (inline === undefined) i++;
        values.splice(0, values.length, value);
        break;
      }
      case "list": {
        if (inline !== undefined) {
          values.push(inline);
          break;
        }
        const start = values.length;
        while (i + 1 < args.length && !isFlag(args[i + 1])) {
          values.push(args[++i]);
        }
        if (values.length === start) {
          result.errors.push(`Option ${flag} requires at least one value`);
        }
        break;
      }
    }
  }

  for (const name of result.switches) {
    delete result.values[name];
  }

  return result;
}
