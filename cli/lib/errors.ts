/**
 * Error conditions raised by the sweep engine.
 *
 * @module
 */

/**
 * An external collaborator exited with a non-zero status.
 * Carries the captured output so the sweep can report it.
 */
export class RunFailedError extends Error {
  readonly command: string;
  readonly code: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(params: {
    command: string;
    code: number;
    stdout: string;
    stderr: string;
  }) {
    super(`Command failed (exit code ${params.code}): ${params.command}`);
    this.name = "RunFailedError";
    this.command = params.command;
    this.code = params.code;
    this.stdout = params.stdout;
    this.stderr = params.stderr;
  }
}

/**
 * A stats file exists but is not valid JSON or not a stats document.
 * Distinct from a missing file, which only degrades extraction.
 */
export class MalformedStatsFileError extends Error {
  readonly path: string;

  constructor(path: string, detail: string, cause?: unknown) {
    super(`Malformed stats file ${path}: ${detail}`, { cause });
    this.name = "MalformedStatsFileError";
    this.path = path;
  }
}

/**
 * A profile could not be resolved from its catalog.
 * Reported by the registry, never thrown past it.
 */
export class ConfigLookupError extends Error {
  readonly profile: string;
  readonly catalog: string;

  constructor(profile: string, catalog: string, detail: string) {
    super(`Error loading profile ${profile} from ${catalog}: ${detail}`);
    this.name = "ConfigLookupError";
    this.profile = profile;
    this.catalog = catalog;
  }
}
