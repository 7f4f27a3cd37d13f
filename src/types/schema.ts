import type { ValuesNode } from './values';

/** Scalar type tags a leaf schema can carry. */
export type ScalarSchemaType = 'boolean' | 'integer' | 'number' | 'string';

/** Every type tag a schema node can carry. */
export type SchemaType = 'object' | 'array' | ScalarSchemaType;

/**
 * Annotations shared by all schema nodes.
 *
 * `readOnly` and `description` are orthogonal to the structural type and are
 * only present when the descriptor configures them.
 */
export type SchemaAnnotations = {
  title?: string;
  description?: string;
  readOnly?: true;
};

export type ScalarSchema = SchemaAnnotations & {
  type: ScalarSchemaType;
};

export type ObjectSchema = SchemaAnnotations & {
  type: 'object';
  properties: Record<string, SchemaNode>;
};

/**
 * Item schema of an enumeration array: the option list exactly as found in
 * the values tree.
 */
export type EnumItemSchema = {
  type: 'string';
  enum: readonly ValuesNode[];
};

/** Item schema of a plain (non-enumeration) array of scalars. */
export type ScalarItemSchema = {
  type: ScalarSchemaType;
};

/**
 * Item schema of an array whose first element is itself a sequence. The
 * inner sequence is not described further.
 */
export type NestedSequenceItemSchema = {
  type: 'array';
};

/**
 * Array of scalars, or an empty array (items default to `string`).
 */
export type ScalarArraySchema = SchemaAnnotations & {
  type: 'array';
  items: ScalarItemSchema | NestedSequenceItemSchema;
};

/**
 * Enumeration array. The option list is metadata, not row data: it is the
 * default value and the set of selectable options at the same time.
 */
export type EnumArraySchema = SchemaAnnotations & {
  type: 'array';
  items: EnumItemSchema;
  uniqueItems: true;
  default: readonly ValuesNode[];
};

/**
 * Array of mappings, described by one representative item schema derived
 * from the first element.
 */
export type ObjectArraySchema = SchemaAnnotations & {
  type: 'array';
  items: ObjectSchema;
};

export type ArraySchema = ScalarArraySchema | EnumArraySchema | ObjectArraySchema;

/** Any node of a synthesized schema tree. */
export type SchemaNode = ScalarSchema | ObjectSchema | ArraySchema;

/**
 * Root of a synthesized schema.
 *
 * `sections` and `ui_metadata` are attached only when the descriptor
 * declares them.
 */
export type RootSchema = {
  type: 'object';
  properties: Record<string, SchemaNode>;
  sections?: readonly Readonly<Record<string, unknown>>[];
  ui_metadata?: Readonly<Record<string, unknown>>;
};
