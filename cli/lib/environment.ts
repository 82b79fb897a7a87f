/**
 * Environment resolution.
 *
 * The process environment is the base layer; variables exported by the
 * shell configuration file (config/env.conf) are layered on top. The
 * merged mapping is resolved once per invocation and handed to the
 * components that need it as a {@link ResolvedPaths} value.
 *
 * Sourcing the configuration file runs arbitrary shell code. Nothing in
 * it is validated beyond KEY=value parsing of the resulting environment.
 *
 * @module
 */

import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { Operation } from "effection";
import { fileExists } from "./fs.ts";
import type { CommandRunner } from "./process.ts";

export type Environment = Record<string, string>;

/**
 * Repository root (two levels above cli/lib/).
 */
export const PROJECT_ROOT = fileURLToPath(new URL("../../", import.meta.url));

/**
 * Filesystem locations used throughout a sweep.
 */
export interface ResolvedPaths {
  /** ETISS checkout, passed to the build/run scripts */
  etissRoot: string;
  /** RISC-V examples checkout, passed to the build/run scripts */
  examplesRoot: string;
  configDir: string;
  scriptsDir: string;
  resultsDir: string;
  envConfig: string;
  etissCatalog: string;
  examplesCatalog: string;
}

/**
 * Copy the defined entries of a process environment.
 */
export function snapshotEnv(env: NodeJS.ProcessEnv): Environment {
  const out: Environment = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

/**
 * Parse `env` output into a mapping. Each line is split at its first
 * `=`; lines without one are ignored.
 */
export function parseEnvOutput(text: string): Environment {
  const out: Environment = {};
  for (const line of text.split("\n")) {
    const eq = line.indexOf("=");
    if (eq <= 0) continue;
    out[line.slice(0, eq)] = line.slice(eq + 1);
  }
  return out;
}

export interface ResolveEnvironmentOpts {
  /** Shell file to source */
  configFile: string;
  /** Base layer, usually the current process environment */
  baseEnv: Environment;
  runner: CommandRunner;
}

/**
 * Source the configuration file in bash and merge the exported variables
 * over the base environment.
 */
export function* resolveEnvironment(
  opts: ResolveEnvironmentOpts,
): Operation<Environment> {
  const base = { ...opts.baseEnv };

  if (!(yield* fileExists(opts.configFile))) {
    console.warn(`Warning: config file not found: ${opts.configFile}`);
    return base;
  }

  const result = yield* opts.runner.run(
    "bash",
    ["-c", 'source "$1" && env', "bash", opts.configFile],
    { env: base },
  );

  if (result.code !== 0) {
    console.warn(
      `Warning: sourcing ${opts.configFile} failed (exit code ${result.code}): ${result.stderr.trim()}`,
    );
    return base;
  }

  return { ...base, ...parseEnvOutput(result.stdout) };
}

/**
 * Home directory the fallback roots live under.
 */
function homeDir(env: Environment): string {
  return env.HOME || env.USERPROFILE || "/tmp";
}

/**
 * Resolve root directories from a merged environment.
 * ETISS_ROOT and EXAMPLES_ROOT override the defaults under $HOME.
 */
export function resolvePaths(
  env: Environment,
  projectRoot: string = PROJECT_ROOT,
): ResolvedPaths {
  const home = homeDir(env);
  const configDir = join(projectRoot, "config");

  return {
    etissRoot: env.ETISS_ROOT || join(home, "etiss"),
    examplesRoot: env.EXAMPLES_ROOT || join(home, "etiss_riscv_examples"),
    configDir,
    scriptsDir: join(projectRoot, "scripts"),
    resultsDir: join(projectRoot, "results"),
    envConfig: join(configDir, "env.conf"),
    etissCatalog: join(configDir, "etiss-builds.json"),
    examplesCatalog: join(configDir, "example-builds.json"),
  };
}
