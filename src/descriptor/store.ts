import type { Descriptor } from '../types';
import type { AtomicDescriptorSwap } from '../architecture';

import { silentLogger, type EngineLogger } from '../logger';
import { EMPTY_DESCRIPTOR } from './descriptor';
import { loadDescriptor, type DescriptorSource } from './loader';

/**
 * Holder of the active descriptor snapshot.
 *
 * See {@link AtomicDescriptorSwap} for the visibility guarantees.
 */
export interface DescriptorStore {
  /**
   * The active descriptor. Callers should capture it once per operation and
   * pass the captured snapshot down, so a concurrent reload cannot change the
   * rules halfway through a synthesis or merge.
   */
  snapshot(): Descriptor;

  /**
   * Re-reads the source and swaps in the result.
   *
   * Never rejects: load failures swap in the empty descriptor
   * (see `loadDescriptor`).
   *
   * @returns The snapshot that is active once this reload settles.
   */
  reload(): Promise<Descriptor>;
}

export type DescriptorStoreOptions = {
  logger?: EngineLogger;

  /**
   * Snapshot served until the first reload completes.
   *
   * @default EMPTY_DESCRIPTOR
   */
  initial?: Descriptor;
};

/**
 * Creates a descriptor store over a source.
 *
 * The store starts with `options.initial` (the empty descriptor unless
 * given); call `reload()` once at startup to load the source, or use
 * {@link openDescriptorStore}.
 */
export function createDescriptorStore(
  source: DescriptorSource,
  options: DescriptorStoreOptions = {}
): DescriptorStore {
  const logger = options.logger ?? silentLogger;

  let active: Descriptor = options.initial ?? EMPTY_DESCRIPTOR;

  // Monotonic ticket per reload. A load that settles after a newer reload was
  // issued is discarded, so the last issued reload always wins.
  let latestTicket = 0;

  return {
    snapshot() {
      return active;
    },

    async reload() {
      const ticket = ++latestTicket;
      const loaded = await loadDescriptor(source, { logger });

      if (ticket !== latestTicket) {
        logger.debug(
          { source: source.name, ticket, latestTicket },
          'Discarding descriptor superseded by a newer reload'
        );
        return active;
      }

      active = loaded;
      logger.info(
        {
          source: source.name,
          readonly: loaded.readonlyPaths.size,
          enum: loaded.enumPaths.size,
          titles: loaded.titles.size,
          descriptions: loaded.descriptions.size,
          sections: loaded.sections.length
        },
        'Descriptor loaded'
      );
      return active;
    }
  };
}

/**
 * Creates a descriptor store and performs the initial load.
 */
export async function openDescriptorStore(
  source: DescriptorSource,
  options: DescriptorStoreOptions = {}
): Promise<DescriptorStore> {
  const store = createDescriptorStore(source, options);
  await store.reload();
  return store;
}
