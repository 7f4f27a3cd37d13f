import { z } from 'zod';

/**
 * Shape of the descriptor document as authored (YAML or JSON).
 *
 * Every key is optional; a document with none of them is the empty
 * descriptor. Paths may be written with or without ordinals
 * (`servers[0].port` and `servers.port` name the same rule).
 *
 * `sections` entries and `ui_metadata` are opaque to the engine and are only
 * required to be mappings.
 */
export const DescriptorDocumentSchema = z.object({
  readonly: z.array(z.string()).default([]),
  enum: z.array(z.string()).default([]),
  titles: z.record(z.string(), z.string()).default({}),
  descriptions: z.record(z.string(), z.string()).default({}),
  sections: z.array(z.record(z.string(), z.unknown())).default([]),
  ui_metadata: z.record(z.string(), z.unknown()).default({})
});

/** Descriptor document after validation, with defaults applied. */
export type DescriptorDocument = z.output<typeof DescriptorDocumentSchema>;
