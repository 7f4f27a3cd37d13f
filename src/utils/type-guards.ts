export type Guard<T> = (value: unknown) => value is T;

/**
 * Mapping of JavaScript `typeof` results to corresponding TypeScript types.
 * Used by the {@link is} factory.
 */
type PrimitiveTypeMap = {
  boolean: boolean;
  number: number;
  bigint: bigint;
  string: string;
};

/**
 * Creates a guard for a built-in primitive `typeof` check.
 *
 * @template T  One of the keys of {@link PrimitiveTypeMap}.
 * @param type  The primitive type keyword to compare against `typeof value`.
 * @returns     A guard that returns `true` iff `typeof value === type`.
 */
export function is<T extends keyof PrimitiveTypeMap>(
  type: T
): Guard<PrimitiveTypeMap[T]> {
  return (value: unknown): value is PrimitiveTypeMap[T] =>
    typeof value === type;
}

/** Guard verifying the value is a string. */
export const isString = is('string');

/** Guard verifying the value is a number (including NaN/Infinity). */
export const isNumber = is('number');

/** Guard verifying the value is a boolean. */
export const isBoolean = is('boolean');

/** Guard verifying the value is a bigint. */
export const isBigInt = is('bigint');

/**
 * Guard verifying the value is `null`.
 *
 * Note:
 * `typeof null === "object"`, so it cannot be expressed via the `is(...)`
 * factory.
 */
export function isNull(value: unknown): value is null {
  return value === null;
}

/**
 * Guard verifying the value is a number with no fractional part.
 *
 * Semantics:
 * - true  for:  0, 1, -1, 1e3, -0
 * - false for:  1.5, NaN, Infinity, -Infinity, non-numbers
 *
 * Note:
 * JavaScript has a single number type, so `1.0` read from a document is
 * indistinguishable from `1` and classifies as an integer.
 */
export function isIntegerValue(value: unknown): value is number {
  return isNumber(value) && Number.isInteger(value);
}
