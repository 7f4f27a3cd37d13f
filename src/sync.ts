import type { FieldPath } from './utils/field-path';

/**
 * Outcome of a synchronization step.
 *
 * Reported alongside fetch and update results; it never turns a successful
 * operation into a failed one.
 */
export type SyncOutcome =
  | { ok: true; message: string; revision?: string }
  | { ok: false; message: string };

export type PublishContext = {
  /** Paths written by the update being published. */
  applied: readonly FieldPath[];
};

/**
 * Mirrors the persisted values document to or from a remote store
 * (e.g. a git repository).
 *
 * - `refresh` runs before a schema or values fetch.
 * - `publish` runs after an update that wrote at least one field.
 *
 * Either may reject; the editor reports a rejection as `{ ok: false }`.
 */
export interface ValuesSync {
  refresh(): Promise<SyncOutcome>;
  publish(context: PublishContext): Promise<SyncOutcome>;
}

/**
 * Runs a sync step, converting a rejection into a failed outcome.
 */
export async function runSyncStep(
  step: () => Promise<SyncOutcome>
): Promise<SyncOutcome> {
  try {
    return await step();
  } catch (error) {
    return {
      ok: false,
      message: error instanceof Error ? error.message : String(error)
    };
  }
}
