/**
 * Tagged optional values and non-empty axes for sweep dimensions.
 *
 * @module
 */

export type Optional<T> = { present: true; value: T } | { present: false };

/**
 * A non-empty, ordered sweep dimension.
 */
export type Axis<T> = readonly [T, ...T[]];

export function some<T>(value: T): Optional<T> {
  return { present: true, value };
}

export const none: Optional<never> = { present: false };

export function toNullable<T>(optional: Optional<T>): T | null {
  return optional.present ? optional.value : null;
}

/**
 * Turn a possibly empty list into an axis, using `fallback` as the single
 * element when the list is absent or empty.
 */
export function axisOf<T>(values: readonly T[] | undefined, fallback: T): Axis<T> {
  if (!values || values.length === 0) {
    return [fallback];
  }
  const [first, ...rest] = values;
  return [first, ...rest];
}
