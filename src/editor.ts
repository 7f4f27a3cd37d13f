import type {
  Descriptor,
  RootSchema,
  SkipNotice,
  ValuesMapping
} from './types';
import type { DescriptorStore } from './descriptor/store';
import type { ValuesSource } from './values-source';

import { InvalidUpdateError, ValuesReadError, ValuesWriteError } from './errors';
import { isValuesMapping } from './guards';
import { silentLogger, type EngineLogger } from './logger';
import { mergeValues } from './merge';
import { formatSkipSummary } from './report';
import { synthesizeSchema } from './synthesizer';
import { runSyncStep, type SyncOutcome, type ValuesSync } from './sync';
import { ROOT_PATH, type FieldPath } from './utils/field-path';

export type ValuesEditorOptions = {
  values: ValuesSource;
  descriptors: DescriptorStore;

  /** Optional remote mirror of the values document. */
  sync?: ValuesSync;

  logger?: EngineLogger;
};

/**
 * Result of a fetch. `sync` is present when a sync hook is configured.
 */
export type FetchResult<T> = {
  data: T;
  sync?: SyncOutcome;
};

/**
 * Result of a submitted update.
 *
 * `success` reflects the merge and the local write only. Skipped fields and
 * a failed publish are reported next to it and do not reject the edit.
 */
export type UpdateResult = {
  success: true;
  message: string;
  applied: FieldPath[];
  skipped: SkipNotice[];
  sync?: SyncOutcome;
};

export type DescriptorSummary = {
  readonly: number;
  enum: number;
  titles: number;
  descriptions: number;
  sections: number;
};

/**
 * The boundary operations a transport (HTTP routes, RPC, CLI) exposes.
 * Each maps to one core call.
 */
export interface ValuesEditor {
  /** Refresh (if syncing), read values, synthesize the schema. */
  fetchSchema(): Promise<FetchResult<RootSchema>>;

  /** Refresh (if syncing) and read values. */
  fetchValues(): Promise<FetchResult<ValuesMapping>>;

  /**
   * Merge a partial update into the persisted values, write them back and
   * publish (if syncing).
   *
   * Submissions are serialized: each read-merge-write cycle completes before
   * the next one reads.
   *
   * @throws InvalidUpdateError if `update` is not a mapping
   * @throws ValuesReadError / ValuesWriteError if persistence fails
   */
  submitUpdate(update: unknown): Promise<UpdateResult>;

  /** Reload the descriptor and summarize the new snapshot. */
  reloadDescriptor(): Promise<DescriptorSummary>;
}

export function summarizeDescriptor(descriptor: Descriptor): DescriptorSummary {
  return {
    readonly: descriptor.readonlyPaths.size,
    enum: descriptor.enumPaths.size,
    titles: descriptor.titles.size,
    descriptions: descriptor.descriptions.size,
    sections: descriptor.sections.length
  };
}

function describeReceived(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  return typeof value;
}

/**
 * Creates the editor service over a values source and a descriptor store.
 */
export function createValuesEditor(options: ValuesEditorOptions): ValuesEditor {
  const { values, descriptors, sync } = options;
  const logger = options.logger ?? silentLogger;

  // Tail of the update queue. Always settles (errors are handled by the
  // caller of each queued cycle), so one failed update never blocks the next.
  let updateQueue: Promise<unknown> = Promise.resolve();

  async function readValues(): Promise<ValuesMapping> {
    try {
      return await values.read();
    } catch (error) {
      logger.error({ err: error, source: values.name }, 'Failed to read values');
      throw new ValuesReadError(values.name, error);
    }
  }

  async function writeValues(tree: ValuesMapping): Promise<void> {
    try {
      await values.write(tree);
    } catch (error) {
      logger.error({ err: error, source: values.name }, 'Failed to write values');
      throw new ValuesWriteError(values.name, error);
    }
  }

  async function runSync(
    label: 'refresh' | 'publish',
    step: () => Promise<SyncOutcome>
  ): Promise<SyncOutcome> {
    const outcome = await runSyncStep(step);
    if (!outcome.ok) {
      logger.error({ step: label, message: outcome.message }, 'Values sync failed');
    }
    return outcome;
  }

  async function fetchWithRefresh<T>(
    load: () => Promise<T>
  ): Promise<FetchResult<T>> {
    if (!sync) return { data: await load() };

    const outcome = await runSync('refresh', () => sync.refresh());
    return { data: await load(), sync: outcome };
  }

  async function applyUpdate(update: ValuesMapping): Promise<UpdateResult> {
    // One snapshot for the whole cycle.
    const descriptor = descriptors.snapshot();

    const current = await readValues();
    const { values: merged, applied, skipped } = mergeValues(
      current,
      update,
      descriptor,
      { logger }
    );

    if (applied.length > 0) {
      await writeValues(merged);
    }

    const skipSummary = formatSkipSummary(skipped);
    const message = [
      applied.length > 0 ? 'Updated successfully' : 'No changes applied',
      skipSummary
    ]
      .filter(Boolean)
      .join('. ');

    logger.info(
      { applied: applied.length, skipped: skipped.length },
      message
    );

    const result: UpdateResult = { success: true, message, applied, skipped };

    if (sync && applied.length > 0) {
      result.sync = await runSync('publish', () => sync.publish({ applied }));
    }

    return result;
  }

  return {
    fetchSchema() {
      return fetchWithRefresh(async () =>
        synthesizeSchema(await readValues(), descriptors.snapshot())
      );
    },

    fetchValues() {
      return fetchWithRefresh(readValues);
    },

    submitUpdate(update) {
      if (!isValuesMapping(update)) {
        return Promise.reject(
          new InvalidUpdateError(ROOT_PATH, describeReceived(update))
        );
      }

      const cycle = updateQueue.then(() => applyUpdate(update));
      updateQueue = cycle.catch(() => undefined);
      return cycle;
    },

    async reloadDescriptor() {
      return summarizeDescriptor(await descriptors.reload());
    }
  };
}
