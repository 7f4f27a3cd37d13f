import type { ValuesMapping, ValuesNode } from './types';

/**
 * Determines whether a value is a "plain object" (a simple POJO / dictionary
 * object).
 *
 * A value is considered plain if all of the following are true:
 * 1. It is not `null`.
 * 2. `typeof value === "object"`.
 * 3. Its prototype is either:
 *    - `Object.prototype` (typical object literals / parsed documents), or
 *    - `null` (objects created via `Object.create(null)`).
 *
 * As a result, this returns `false` for arrays, Dates, Maps, Sets, class
 * instances and other host objects.
 *
 * TypeScript:
 * - The generic `T` is a compile-time hint only; it is **not** validated at
 *   runtime.
 *
 * @typeParam T
 *   The (assumed) type of the object's property values after a successful check.
 * @param value
 *   The value to test.
 * @returns
 *   `true` if `value` is a plain object; otherwise `false`.
 */
export function isPlainObject<T = unknown>(
  value: unknown
): value is Record<string, T> {
  if (typeof value !== 'object' || value === null) return false;

  const proto = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

/**
 * Checks whether a value is a mapping node of a values tree.
 *
 * Only the container is checked. Children are classified lazily by the
 * walkers (`classifyValue`), which tolerate values outside the tree model.
 */
export function isValuesMapping(value: unknown): value is ValuesMapping {
  return isPlainObject<ValuesNode>(value);
}

/**
 * Checks whether a value is a sequence node of a values tree.
 *
 * Wrapper around `Array.isArray` that acts as a TypeScript type guard.
 * Elements are not validated at runtime.
 */
export function isValuesSequence(value: unknown): value is ValuesNode[] {
  return Array.isArray(value);
}
