import type { FieldPath } from '../utils/field-path';
import type { ValuesMapping } from './values';

/**
 * Why an update entry was not written.
 *
 * - `readonly`: the path is declared read-only.
 * - `enum`: the path is an enumeration and the current value is its option
 *   list.
 */
export type SkipReason = 'readonly' | 'enum';

/** A field the merge left untouched because of a protection rule. */
export type SkipNotice = {
  /** Accumulated (non-normalized) path of the skipped entry. */
  path: FieldPath;
  reason: SkipReason;
};

export type MergeResult = {
  /** The merged values tree. The input trees are never modified. */
  values: ValuesMapping;

  /** Paths whose values were replaced, in traversal order. */
  applied: FieldPath[];

  /** Protected paths that were left untouched, in traversal order. */
  skipped: SkipNotice[];
};
