import { vi } from 'vitest';

import type { Descriptor, ValuesMapping } from '../types';
import type { EngineLogger } from '../logger';
import type { SyncOutcome, ValuesSync } from '../sync';
import type { ValuesSource } from '../values-source';

import { createDescriptor } from '../descriptor/descriptor';
import { DescriptorDocumentSchema } from '../descriptor/document-schema';

/**
 * Builds a descriptor from a partial document, the way the loader would.
 */
export function buildDescriptor(document: unknown = {}): Descriptor {
  return createDescriptor(DescriptorDocumentSchema.parse(document));
}

/**
 * Logger double recording every call.
 */
export function createLoggerSpy() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  } satisfies EngineLogger;
}

/**
 * In-process values source. `written` records every tree passed to `write`.
 */
export function createMemoryValuesSource(initial: ValuesMapping) {
  let stored = structuredClone(initial);
  const written: ValuesMapping[] = [];

  const source = {
    name: 'memory://values',
    read: vi.fn(async (): Promise<ValuesMapping> => structuredClone(stored)),
    write: vi.fn(async (values: ValuesMapping): Promise<void> => {
      stored = structuredClone(values);
      written.push(structuredClone(values));
    })
  } satisfies ValuesSource;

  return { source, written, current: () => stored };
}

/**
 * Sync double returning fixed outcomes.
 */
export function createSyncSpy(
  outcomes: { refresh?: SyncOutcome; publish?: SyncOutcome } = {}
) {
  return {
    refresh: vi.fn(
      async (): Promise<SyncOutcome> =>
        outcomes.refresh ?? { ok: true, message: 'Already up to date' }
    ),
    publish: vi.fn(
      async (): Promise<SyncOutcome> =>
        outcomes.publish ?? { ok: true, message: 'Published', revision: 'abc123' }
    )
  } satisfies ValuesSync;
}
