/**
 * Scalar leaves of a values tree.
 *
 * `null` appears for YAML keys declared without a value (`tag:`).
 */
export type ValuesScalar = boolean | number | string | null;

/**
 * A mapping node: string keys to child nodes.
 *
 * Keys are unique per mapping and the tree is acyclic; the values source
 * guarantees both.
 */
export type ValuesMapping = { [key: string]: ValuesNode };

/** An ordered sequence node. */
export type ValuesSequence = ValuesNode[];

/** Any node of a values tree. */
export type ValuesNode = ValuesMapping | ValuesSequence | ValuesScalar;

/**
 * Runtime classification of a node.
 *
 * The variants are discriminated by `kind` so dispatch never relies on
 * `typeof` ordering at the call site. `integer` and `boolean` are distinct
 * kinds even though some sources represent booleans as `0`/`1`.
 *
 * `unknown` covers values outside the tree model (e.g. a `Date` produced by
 * a custom YAML schema); consumers treat it like a string.
 */
export type ValueKind =
  | { kind: 'mapping'; entries: ValuesMapping }
  | { kind: 'sequence'; items: readonly ValuesNode[] }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'integer'; value: number | bigint }
  | { kind: 'number'; value: number }
  | { kind: 'text'; value: string }
  | { kind: 'null' }
  | { kind: 'unknown'; value: unknown };

/** Discriminant of {@link ValueKind}. */
export type ValueKindTag = ValueKind['kind'];
