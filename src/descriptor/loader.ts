import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';

import type { Descriptor } from '../types';

import { silentLogger, type EngineLogger } from '../logger';
import { createDescriptor, EMPTY_DESCRIPTOR } from './descriptor';
import { DescriptorDocumentSchema } from './document-schema';
import { validateWithSchema } from './validator';

/**
 * Supplies the raw descriptor document.
 *
 * `read` resolves to the parsed document, or to `null`/`undefined` when no
 * document exists. Rejections are treated as load failures.
 */
export interface DescriptorSource {
  /** Name used in log records (e.g. the file path). */
  readonly name: string;

  read(): Promise<unknown>;
}

export type LoadDescriptorOptions = {
  logger?: EngineLogger;
};

/**
 * Loads a descriptor from its source, failing softly.
 *
 * Fail-soft contract:
 * - Read errors and documents rejected by {@link DescriptorDocumentSchema}
 *   are logged at `warn` level and yield {@link EMPTY_DESCRIPTOR}.
 * - An absent document (`null`/`undefined`, e.g. an empty YAML file) also
 *   yields the empty descriptor.
 * - The promise never rejects.
 *
 * @param source
 *   Where the raw document comes from.
 * @param options
 *   Optional logger for load diagnostics.
 * @returns
 *   The loaded descriptor, or the empty descriptor.
 */
export async function loadDescriptor(
  source: DescriptorSource,
  options: LoadDescriptorOptions = {}
): Promise<Descriptor> {
  const logger = options.logger ?? silentLogger;

  let raw: unknown;
  try {
    raw = await source.read();
  } catch (error) {
    logger.warn(
      { err: error, source: source.name },
      'Descriptor could not be read; falling back to an empty descriptor'
    );
    return EMPTY_DESCRIPTOR;
  }

  if (raw == null) {
    logger.debug({ source: source.name }, 'Descriptor document is empty');
    return EMPTY_DESCRIPTOR;
  }

  try {
    const document = validateWithSchema(
      DescriptorDocumentSchema,
      raw,
      source.name
    );
    return createDescriptor(document);
  } catch (error) {
    logger.warn(
      { err: error, source: source.name },
      'Descriptor document is invalid; falling back to an empty descriptor'
    );
    return EMPTY_DESCRIPTOR;
  }
}

/**
 * Descriptor source backed by a YAML (or JSON) file.
 *
 * The file is re-read on every `read`, so a reload picks up edits.
 */
export function createYamlFileDescriptorSource(
  filePath: string
): DescriptorSource {
  return {
    name: filePath,
    async read() {
      const text = await readFile(filePath, 'utf8');
      return parse(text);
    }
  };
}
