/**
 * Outcome of one unit of work (a build, a sweep combination), so that a
 * failing unit is recorded instead of aborting its batch.
 *
 * @module
 */

import type { Operation } from "effection";

export interface Ok<T> {
  ok: true;
  value: T;
}

/**
 * A failed unit. `context` names it, e.g. a configuration summary.
 */
export interface Failure {
  ok: false;
  error: Error;
  context: string;
}

export type Result<T> = Ok<T> | Failure;

/**
 * Narrow an unknown caught value to an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Run `op`, returning its value or the error it raised.
 *
 * @param context - Identifier for error reporting
 */
export function* wrapResult<T>(
  context: string,
  op: Operation<T>,
): Operation<Result<T>> {
  try {
    const value = yield* op;
    return { ok: true, value };
  } catch (error: unknown) {
    return { ok: false, error: toError(error), context };
  }
}

/**
 * Record a unit as failed without running it.
 */
export function failed(context: string, error: Error): Failure {
  return { ok: false, error, context };
}

/**
 * Split results into values and failures, each in their original order.
 */
export function partition<T>(results: Result<T>[]): { values: T[]; failures: Failure[] } {
  const values: T[] = [];
  const failures: Failure[] = [];
  for (const result of results) {
    if (result.ok) {
      values.push(result.value);
    } else {
      failures.push(result);
    }
  }
  return { values, failures };
}
