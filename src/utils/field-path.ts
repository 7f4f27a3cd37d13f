import type { NormalizedPathKeySpace } from '../architecture';

/**
 * A dotted field path into a values tree.
 *
 * Mapping keys are joined with `.`; sequence elements are addressed with a
 * bracketed ordinal on the parent key:
 *
 * - `image.repository`
 * - `servers[0].port`
 *
 * Paths are plain strings so they can be logged and reported as-is.
 */
export type FieldPath = string;

/** Root of every accumulated path. */
export const ROOT_PATH: FieldPath = '';

/**
 * Matches a single bracketed ordinal (`[0]`, `[12]`).
 *
 * Only digit-only brackets are ordinals; `[x]` or an unbalanced `[` is left
 * alone.
 */
const ORDINAL_SEGMENT = /\[\d+\]/g;

/**
 * Strips every bracketed ordinal from a path.
 *
 * The result is the lookup key for descriptor rules: all elements of a
 * sequence share one set of rules regardless of position
 * (see {@link NormalizedPathKeySpace}).
 *
 * Examples:
 * - `servers[0].port`      -> `servers.port`
 * - `matrix[0][1].value`   -> `matrix.value`
 * - `image.tag`            -> `image.tag`
 * - `broken[0.port`        -> `broken[0.port` (passed through)
 *
 * Normalization is best-effort and never throws. It is idempotent: the
 * output contains no ordinal segment, so a second pass changes nothing.
 *
 * @param path
 *   A field path, indexed or not.
 * @returns
 *   The path without ordinal segments.
 */
export function normalizeFieldPath(path: FieldPath): FieldPath {
  return path.replace(ORDINAL_SEGMENT, '');
}

/**
 * Extends a path by a mapping key.
 *
 * @param path
 *   The parent path (`ROOT_PATH` at the top level).
 * @param key
 *   The child key.
 * @returns
 *   `key` at the root, otherwise `path.key`.
 */
export function appendKey(path: FieldPath, key: string): FieldPath {
  return path === ROOT_PATH ? key : `${path}.${key}`;
}

/**
 * Extends a path by a sequence ordinal (`servers` -> `servers[0]`).
 */
export function appendIndex(path: FieldPath, index: number): FieldPath {
  return `${path}[${index}]`;
}

/**
 * Returns the last dotted segment of a path, ordinals included
 * (`servers[0].name` -> `name`, `servers[0]` -> `servers[0]`).
 */
export function lastSegment(path: FieldPath): string {
  const separator = path.lastIndexOf('.');
  return separator === -1 ? path : path.slice(separator + 1);
}
