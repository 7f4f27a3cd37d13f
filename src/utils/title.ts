import { lastSegment, normalizeFieldPath, type FieldPath } from './field-path';

/**
 * Derives a human-readable label from a field path.
 *
 * Steps:
 * 1. Take the last path segment and strip its ordinal suffix
 *    (`servers[0]` -> `servers`).
 * 2. Insert a space wherever a lowercase letter is directly followed by an
 *    uppercase letter (`pullPolicy` -> `pull Policy`).
 * 3. Replace underscores with spaces (`max_replicas` -> `max replicas`).
 * 4. Title-case every word: first letter upper, the rest lower
 *    (`enableTLS` -> `Enable Tls`).
 *
 * Runs of separators collapse to a single space.
 *
 * @param path
 *   Field path of the node being labelled.
 * @returns
 *   The derived title; empty for an empty path.
 */
export function deriveTitle(path: FieldPath): string {
  const segment = normalizeFieldPath(lastSegment(path));

  return segment
    .replace(/([a-z])([A-Z])/g, '$1 $2')
    .replace(/_/g, ' ')
    .split(/\s+/)
    .filter(word => word.length > 0)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

/**
 * Derives the title of the representative item of an array-of-objects.
 *
 * Literal heuristic, no pluralization rules:
 * - a title ending in a plain `s` loses it (`Servers` -> `Server`);
 * - any other title gets ` Item` appended (`Data` -> `Data Item`).
 *
 * Irregular plurals are not special-cased (`Policies` -> `Policie`).
 *
 * @param arrayTitle
 *   Title of the array node.
 * @returns
 *   Title for the item schema.
 */
export function deriveItemTitle(arrayTitle: string): string {
  if (arrayTitle.endsWith('s')) return arrayTitle.slice(0, -1);
  return `${arrayTitle} Item`;
}
