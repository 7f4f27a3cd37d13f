import { readFile, writeFile } from 'node:fs/promises';
import { parse, parseDocument, stringify, type Document } from 'yaml';

import type { ValuesMapping, ValuesNode } from './types';

import { isValuesMapping, isValuesSequence } from './guards';

/**
 * Supplies the persisted values tree and accepts the merged one.
 *
 * Implementations guarantee unique keys per mapping and an acyclic tree.
 * Rejections of `read` and `write` propagate to the caller unchanged.
 */
export interface ValuesSource {
  /** Name used in errors and log records (e.g. the file path). */
  readonly name: string;

  read(): Promise<ValuesMapping>;

  write(values: ValuesMapping): Promise<void>;
}

/**
 * Parses a values document.
 *
 * An empty document (or one holding only `null`) is the empty mapping.
 *
 * @throws Error if the YAML is malformed or its root is not a mapping
 */
export function parseValuesDocument(text: string): ValuesMapping {
  const document: unknown = parse(text);

  if (document == null) return {};

  if (!isValuesMapping(document)) {
    const received = Array.isArray(document) ? 'a sequence' : typeof document;
    throw new Error(`Values document root must be a mapping, received ${received}`);
  }

  return document;
}

/**
 * Serializes a values tree to YAML in block style.
 */
export function serializeValuesDocument(values: ValuesMapping): string {
  return stringify(values, { indent: 2 });
}

/**
 * Writes `values` into an existing values document and returns the new text.
 *
 * Only entries whose value differs from the document's current content are
 * replaced; every other node is kept as parsed. Number formatting (`1.0`),
 * integers beyond `Number.MAX_SAFE_INTEGER` and comments on untouched
 * entries survive. Entries missing from `values` are removed.
 *
 * @throws Error if `text` is not a valid values document
 */
export function updateValuesDocument(text: string, values: ValuesMapping): string {
  const previous = parseValuesDocument(text);
  const document = parseDocument(text, { intAsBigInt: true });

  applyChanges(document, [], previous, values);

  return document.toString({ indent: 2 });
}

function applyChanges(
  document: Document,
  path: readonly string[],
  previous: ValuesMapping,
  next: ValuesMapping
): void {
  for (const key of Object.keys(next)) {
    const entryPath = [...path, key];
    const before = Object.hasOwn(previous, key) ? previous[key] : undefined;
    const after = next[key];

    if (isValuesMapping(before) && isValuesMapping(after)) {
      applyChanges(document, entryPath, before, after);
    } else if (before === undefined || !isSameNode(before, after)) {
      document.setIn(entryPath, after);
    }
  }

  for (const key of Object.keys(previous)) {
    if (!Object.hasOwn(next, key)) document.deleteIn([...path, key]);
  }
}

function isSameNode(left: ValuesNode, right: ValuesNode): boolean {
  if (isValuesSequence(left)) {
    if (!isValuesSequence(right) || left.length !== right.length) return false;

    const items = right;
    return left.every((item, index) => isSameNode(item, items[index]));
  }

  if (isValuesMapping(left)) {
    if (!isValuesMapping(right)) return false;

    const entries = left;
    const other = right;
    const keys = Object.keys(entries);
    return (
      keys.length === Object.keys(other).length &&
      keys.every(key => Object.hasOwn(other, key) && isSameNode(entries[key], other[key]))
    );
  }

  return Object.is(left, right);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Values source backed by a YAML file.
 *
 * The file is re-read on every `read`; no state is cached between calls.
 * `write` updates the file's current document in place (see
 * {@link updateValuesDocument}); a missing file is created.
 */
export function createYamlFileValuesSource(filePath: string): ValuesSource {
  async function readText(): Promise<string> {
    try {
      return await readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return '';
      throw error;
    }
  }

  return {
    name: filePath,

    async read() {
      const text = await readFile(filePath, 'utf8');
      return parseValuesDocument(text);
    },

    async write(values) {
      const text = await readText();
      await writeFile(filePath, updateValuesDocument(text, values), 'utf8');
    }
  };
}
