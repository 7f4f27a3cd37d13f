import type { Descriptor } from '../types';
import type { DescriptorDocument } from './document-schema';

import { normalizeFieldPath, type FieldPath } from '../utils/field-path';
import { deriveTitle } from '../utils/title';

/**
 * Descriptor with every rule set empty.
 *
 * Used before the first load and whenever loading fails.
 */
export const EMPTY_DESCRIPTOR: Descriptor = Object.freeze({
  readonlyPaths: new Set<string>(),
  enumPaths: new Set<string>(),
  titles: new Map<string, string>(),
  descriptions: new Map<string, string>(),
  sections: Object.freeze([]),
  uiMetadata: Object.freeze({})
});

function normalizedSet(paths: readonly string[]): ReadonlySet<string> {
  return new Set(paths.map(normalizeFieldPath));
}

/**
 * Later entries win when two keys normalize to the same path
 * (`servers[0].port` and `servers.port`).
 */
function normalizedMap(
  entries: Readonly<Record<string, string>>
): ReadonlyMap<string, string> {
  return new Map(
    Object.entries(entries).map(([path, value]) => [
      normalizeFieldPath(path),
      value
    ])
  );
}

/**
 * Builds an immutable descriptor from a validated document.
 *
 * Every key is normalized once here, so lookups only normalize the path
 * being asked about.
 *
 * @param document
 *   Descriptor document after schema validation.
 * @returns
 *   A frozen descriptor snapshot.
 */
export function createDescriptor(document: DescriptorDocument): Descriptor {
  return Object.freeze({
    readonlyPaths: normalizedSet(document.readonly),
    enumPaths: normalizedSet(document.enum),
    titles: normalizedMap(document.titles),
    descriptions: normalizedMap(document.descriptions),
    sections: Object.freeze(document.sections.map(section => Object.freeze({ ...section }))),
    uiMetadata: Object.freeze({ ...document.ui_metadata })
  });
}

/** Whether an update must never overwrite the value at `path`. */
export function isReadonly(descriptor: Descriptor, path: FieldPath): boolean {
  return descriptor.readonlyPaths.has(normalizeFieldPath(path));
}

/** Whether the sequence at `path` is an enumeration option list. */
export function isEnum(descriptor: Descriptor, path: FieldPath): boolean {
  return descriptor.enumPaths.has(normalizeFieldPath(path));
}

/** Whether a custom title is configured for `path`. */
export function hasCustomTitle(
  descriptor: Descriptor,
  path: FieldPath
): boolean {
  return descriptor.titles.has(normalizeFieldPath(path));
}

/**
 * Label for the node at `path`: the configured title, or one derived from
 * the last path segment (see {@link deriveTitle}).
 */
export function titleFor(descriptor: Descriptor, path: FieldPath): string {
  return descriptor.titles.get(normalizeFieldPath(path)) ?? deriveTitle(path);
}

/** Configured help text for `path`, if any. */
export function descriptionFor(
  descriptor: Descriptor,
  path: FieldPath
): string | undefined {
  return descriptor.descriptions.get(normalizeFieldPath(path));
}
