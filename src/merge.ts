import type {
  Descriptor,
  MergeResult,
  SkipNotice,
  SkipReason,
  ValuesMapping,
  ValuesNode
} from './types';
import type { ProtectedFieldPolicy } from './architecture';

import { isEnum, isReadonly } from './descriptor/descriptor';
import { isValuesMapping, isValuesSequence } from './guards';
import { silentLogger, type EngineLogger } from './logger';
import { appendKey, ROOT_PATH, type FieldPath } from './utils/field-path';
import { defineEntry } from './utils/own-entry';

export type MergeOptions = {
  /**
   * Receives one `info` record per skipped field.
   */
  logger?: EngineLogger;
};

/**
 * Accumulators shared by one merge run. Only the result lists are mutated;
 * the trees never are.
 */
type MergeContext = {
  descriptor: Descriptor;
  logger: EngineLogger;
  applied: FieldPath[];
  skipped: SkipNotice[];
};

/**
 * Merges a partial update into the current values tree, honoring the
 * descriptor's protection rules (see {@link ProtectedFieldPolicy}).
 *
 * The execution flow per update entry follows a **Guard → Traverse → Commit**
 * pipeline:
 *
 * 1. Guard Phase (Protection Rules):
 *
 * 1.1 Read-only Rule:
 *     A read-only path is skipped before anything else is inspected.
 *
 * 1.2 Enumeration Rule:
 *     An enum path whose current value is a sequence is skipped: the option
 *     list is metadata and the submitted selection must not replace it.
 *
 * 2. Traverse Phase (Recursion):
 *    When the update value is a mapping, the merge recurses with the path
 *    extended by the key if the current value is a mapping too. A mapping
 *    that replaces a non-mapping is also traversed (against an empty base)
 *    when it carries read-only paths, so those entries are skipped rather
 *    than created.
 *
 * 3. Commit Phase (Whole-Value Replacement):
 *
 * 3.1 Protected Descendants:
 *     Replacing a current mapping wholesale would discard every entry below
 *     it. If one of them is read-only, or is an enum-marked sequence, the
 *     whole entry is skipped with that reason.
 *
 * 3.2 Replacement:
 *     Every other entry replaces the current value wholesale. Arrays are
 *     never merged index by index.
 *
 * Guarantees:
 * - Inputs are never mutated. Changed mappings are copied; unchanged subtrees
 *   are shared with `current` by reference.
 * - Keys absent from `update` keep their current value at every depth.
 * - Rules are looked up with the accumulated path, normalized at lookup time.
 *
 * Example:
 * current    = { image: { repository: "nginx", tag: "1.0" } }
 * update     = { image: { repository: "custom", tag: "2.0" } }
 * readonly   = ["image.repository"]
 * values     = { image: { repository: "nginx", tag: "2.0" } }
 * applied    = ["image.tag"]
 * skipped    = [{ path: "image.repository", reason: "readonly" }]
 *
 * @param current
 *   The values tree as persisted.
 * @param update
 *   The partial update (only the keys the caller supplies).
 * @param descriptor
 *   Descriptor snapshot providing the protection rules.
 * @param options
 *   Optional logger for skip notices.
 * @returns
 *   The merged tree plus the applied and skipped paths.
 */
export function mergeValues(
  current: ValuesMapping,
  update: ValuesMapping,
  descriptor: Descriptor,
  options: MergeOptions = {}
): MergeResult {
  const context: MergeContext = {
    descriptor,
    logger: options.logger ?? silentLogger,
    applied: [],
    skipped: []
  };

  const values = mergeMapping(current, update, ROOT_PATH, context);

  return { values, applied: context.applied, skipped: context.skipped };
}

/**
 * Merges one mapping level and returns the resulting mapping.
 *
 * A copy of `current` is allocated on the first write only; when every entry
 * is skipped, `current` itself is returned.
 */
function mergeMapping(
  current: ValuesMapping,
  update: ValuesMapping,
  path: FieldPath,
  context: MergeContext
): ValuesMapping {
  let result: ValuesMapping | undefined;

  for (const key of Object.keys(update)) {
    const fieldPath = appendKey(path, key);
    const currentValue = Object.hasOwn(current, key) ? current[key] : undefined;
    const updateValue = update[key];

    // 1.1 Guard Phase (Read-only Rule)
    if (isReadonly(context.descriptor, fieldPath)) {
      skip(context, fieldPath, 'readonly');
      continue;
    }

    // 1.2 Guard Phase (Enumeration Rule)
    if (isEnum(context.descriptor, fieldPath) && isValuesSequence(currentValue)) {
      skip(context, fieldPath, 'enum');
      continue;
    }

    let mergedValue: ValuesNode;

    // 2. Traverse Phase
    if (
      isValuesMapping(updateValue) &&
      (isValuesMapping(currentValue) ||
        containsReadonlyPath(updateValue, fieldPath, context.descriptor))
    ) {
      const base: ValuesMapping = isValuesMapping(currentValue) ? currentValue : {};
      mergedValue = mergeMapping(base, updateValue, fieldPath, context);
      if (mergedValue === base) continue;
    }
    // 3. Commit Phase
    else {
      const protectedReason = isValuesMapping(currentValue)
        ? findProtectedDescendant(currentValue, fieldPath, context.descriptor)
        : undefined;

      // 3.1 Protected Descendants
      if (protectedReason) {
        skip(context, fieldPath, protectedReason);
        continue;
      }

      // 3.2 Replacement
      mergedValue = updateValue;
      context.applied.push(fieldPath);
    }

    if (!result) result = copyMapping(current);
    defineEntry(result, key, mergedValue);
  }

  return result ?? current;
}

function skip(context: MergeContext, path: FieldPath, reason: SkipReason): void {
  context.skipped.push({ path, reason });
  context.logger.info({ path, reason }, 'Skipped protected field');
}

/**
 * Finds the first entry below `path` that a wholesale replacement of `tree`
 * would discard although it is protected: a read-only path, or an enum path
 * holding a sequence. Sequences are atomic and are not descended into.
 *
 * @returns The skip reason of that entry; undefined if there is none
 */
function findProtectedDescendant(
  tree: ValuesMapping,
  path: FieldPath,
  descriptor: Descriptor
): SkipReason | undefined {
  for (const key of Object.keys(tree)) {
    const childPath = appendKey(path, key);
    const child = tree[key];

    if (isReadonly(descriptor, childPath)) return 'readonly';
    if (isEnum(descriptor, childPath) && isValuesSequence(child)) return 'enum';

    if (isValuesMapping(child)) {
      const reason = findProtectedDescendant(child, childPath, descriptor);
      if (reason) return reason;
    }
  }

  return undefined;
}

/** Whether any entry below `path` in `tree` is read-only. */
function containsReadonlyPath(
  tree: ValuesMapping,
  path: FieldPath,
  descriptor: Descriptor
): boolean {
  return Object.keys(tree).some(key => {
    const childPath = appendKey(path, key);
    const child = tree[key];

    return (
      isReadonly(descriptor, childPath) ||
      (isValuesMapping(child) && containsReadonlyPath(child, childPath, descriptor))
    );
  });
}

/**
 * Shallow copy that keeps every key an own data property, including
 * `__proto__`.
 */
function copyMapping(source: ValuesMapping): ValuesMapping {
  const copy: ValuesMapping = {};
  for (const key of Object.keys(source)) {
    defineEntry(copy, key, source[key]);
  }
  return copy;
}
