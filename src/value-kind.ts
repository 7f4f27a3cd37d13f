import type { ScalarSchemaType, ValueKind } from './types';

import { isValuesMapping, isValuesSequence } from './guards';
import {
  isBigInt,
  isBoolean,
  isIntegerValue,
  isNull,
  isNumber,
  isString
} from './utils/type-guards';

/**
 * Classifies a runtime value into a {@link ValueKind} variant.
 *
 * Check order is part of the contract:
 * 1. Containers: mapping, then sequence.
 * 2. `boolean` before any numeric check.
 * 3. `integer` (whole numbers and bigints) before `number`.
 * 4. `text`, then `null`.
 * 5. Anything else is `unknown`.
 *
 * @param value
 *   A node of a values tree, or any value found in its place.
 * @returns
 *   The tagged classification.
 */
export function classifyValue(value: unknown): ValueKind {
  if (isValuesMapping(value)) return { kind: 'mapping', entries: value };
  if (isValuesSequence(value)) return { kind: 'sequence', items: value };
  if (isBoolean(value)) return { kind: 'boolean', value };
  if (isIntegerValue(value) || isBigInt(value)) {
    return { kind: 'integer', value };
  }
  if (isNumber(value)) return { kind: 'number', value };
  if (isString(value)) return { kind: 'text', value };
  if (isNull(value)) return { kind: 'null' };
  return { kind: 'unknown', value };
}

/**
 * Whether a classified value is a scalar leaf (anything but a container).
 */
export function isScalarKind(
  kind: ValueKind
): kind is Exclude<ValueKind, { kind: 'mapping' | 'sequence' }> {
  return kind.kind !== 'mapping' && kind.kind !== 'sequence';
}

/**
 * Maps a scalar classification to its schema type.
 *
 * `null` and `unknown` have no schema type of their own and fall back to
 * `string`, as does any container handed in by mistake.
 */
export function scalarSchemaType(kind: ValueKind): ScalarSchemaType {
  switch (kind.kind) {
    case 'boolean':
      return 'boolean';
    case 'integer':
      return 'integer';
    case 'number':
      return 'number';
    default:
      return 'string';
  }
}
