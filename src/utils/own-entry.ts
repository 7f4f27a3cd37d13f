/**
 * Writes an entry as an own enumerable data property.
 *
 * Plain assignment (and `Object.assign`) of a `__proto__` key would replace
 * the target's prototype instead of storing the entry.
 */
export function defineEntry<T>(
  target: Record<string, T>,
  key: string,
  value: T
): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true
  });
}
