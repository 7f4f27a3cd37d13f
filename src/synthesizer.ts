import type {
  ArraySchema,
  Descriptor,
  ObjectSchema,
  RootSchema,
  SchemaAnnotations,
  SchemaNode,
  ValueKind,
  ValuesMapping,
  ValuesNode
} from './types';
import type { RepresentativeItemSchema } from './architecture';

import {
  descriptionFor,
  hasCustomTitle,
  isEnum,
  isReadonly,
  titleFor
} from './descriptor/descriptor';
import { appendIndex, appendKey, ROOT_PATH, type FieldPath } from './utils/field-path';
import { defineEntry } from './utils/own-entry';
import { deriveItemTitle } from './utils/title';
import { classifyValue, isScalarKind, scalarSchemaType } from './value-kind';

/**
 * Synthesizes the annotated schema of a values tree.
 *
 * The schema mirrors the tree's shape; the descriptor contributes titles,
 * descriptions, read-only flags and enumeration option lists.
 *
 * Classification per node (see `synthesizeNode`):
 * 1. Mapping   -> `object` with one property per key.
 * 2. Sequence  -> `array`; the item schema depends on emptiness, the enum
 *                 rule and the first element.
 * 3. Scalar    -> `boolean` | `integer` | `number` | `string`.
 *
 * Root:
 * - Emits `{ type: 'object', properties }` without a title.
 * - Attaches the descriptor's `sections` and `ui_metadata` verbatim, only when
 *   present, so an empty descriptor yields a bare object schema.
 * - A `null`/`undefined` tree synthesizes to an empty object schema.
 *
 * The function is total and deterministic: the same tree and descriptor always
 * produce structurally equal schemas, and no input makes it throw.
 *
 * @param values
 *   The values tree (root mapping), or nothing.
 * @param descriptor
 *   Descriptor snapshot to annotate with.
 * @returns
 *   A freshly built schema tree.
 */
export function synthesizeSchema(
  values: ValuesMapping | null | undefined,
  descriptor: Descriptor
): RootSchema {
  const schema: RootSchema = {
    type: 'object',
    properties: values ? synthesizeProperties(values, ROOT_PATH, descriptor) : {}
  };

  if (descriptor.sections.length > 0) {
    schema.sections = descriptor.sections;
  }

  if (Object.keys(descriptor.uiMetadata).length > 0) {
    schema.ui_metadata = descriptor.uiMetadata;
  }

  return schema;
}

/**
 * Synthesizes one property per mapping entry, keyed by the original
 * (non-normalized) key.
 */
function synthesizeProperties(
  entries: ValuesMapping,
  path: FieldPath,
  descriptor: Descriptor
): Record<string, SchemaNode> {
  const properties: Record<string, SchemaNode> = {};

  for (const key of Object.keys(entries)) {
    defineEntry(
      properties,
      key,
      synthesizeNode(entries[key], appendKey(path, key), descriptor)
    );
  }

  return properties;
}

/**
 * Classifies a node structurally, then applies the orthogonal annotations
 * (`readOnly`, `description`) for its path.
 */
function synthesizeNode(
  value: ValuesNode,
  path: FieldPath,
  descriptor: Descriptor
): SchemaNode {
  const kind = classifyValue(value);
  return annotate(synthesizeStructure(kind, path, descriptor), path, descriptor);
}

function synthesizeStructure(
  kind: ValueKind,
  path: FieldPath,
  descriptor: Descriptor
): SchemaNode {
  switch (kind.kind) {
    case 'mapping':
      return synthesizeObject(kind.entries, path, descriptor);

    case 'sequence':
      return synthesizeArray(kind.items, path, descriptor);

    default:
      return { type: scalarSchemaType(kind), title: titleFor(descriptor, path) };
  }
}

function synthesizeObject(
  entries: ValuesMapping,
  path: FieldPath,
  descriptor: Descriptor,
  title: string = titleFor(descriptor, path)
): ObjectSchema {
  return {
    type: 'object',
    title,
    properties: synthesizeProperties(entries, path, descriptor)
  };
}

/**
 * Array classification, in order:
 *
 * 1. Empty: no sample to infer from; items default to `string`.
 * 2. Enumeration: path marked enum and first element scalar. The whole list
 *    becomes the option set and the default value.
 * 3. Array of mappings: one representative item schema from the first
 *    element (see {@link RepresentativeItemSchema}).
 * 4. Array of scalars: item type inferred from the first element.
 */
function synthesizeArray(
  items: readonly ValuesNode[],
  path: FieldPath,
  descriptor: Descriptor
): ArraySchema {
  const title = titleFor(descriptor, path);

  // 1. Empty
  if (items.length === 0) {
    return { type: 'array', title, items: { type: 'string' } };
  }

  const first = classifyValue(items[0]);

  // 2. Enumeration
  if (isEnum(descriptor, path) && isScalarKind(first)) {
    return {
      type: 'array',
      title,
      items: { type: 'string', enum: [...items] },
      uniqueItems: true,
      default: [...items]
    };
  }

  // 3. Array of mappings
  if (first.kind === 'mapping') {
    const itemPath = appendIndex(path, 0);
    const itemTitle = hasCustomTitle(descriptor, itemPath)
      ? titleFor(descriptor, itemPath)
      : deriveItemTitle(title);

    const itemSchema = synthesizeObject(
      first.entries,
      itemPath,
      descriptor,
      itemTitle
    );

    return {
      type: 'array',
      title,
      items: annotate(itemSchema, itemPath, descriptor)
    };
  }

  // 4. Array of sequences
  if (first.kind === 'sequence') {
    return { type: 'array', title, items: { type: 'array' } };
  }

  // 5. Array of scalars
  return { type: 'array', title, items: { type: scalarSchemaType(first) } };
}

/**
 * Adds `readOnly` and `description` when the descriptor configures them for
 * `path`. Structural fields are left untouched.
 */
function annotate<T extends SchemaAnnotations>(
  schema: T,
  path: FieldPath,
  descriptor: Descriptor
): T {
  if (isReadonly(descriptor, path)) schema.readOnly = true;

  const description = descriptionFor(descriptor, path);
  if (description !== undefined) schema.description = description;

  return schema;
}
