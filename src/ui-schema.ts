import type { RootSchema, SchemaNode } from './types';

import { defineEntry } from './utils/own-entry';

/**
 * Per-field UI options in the `react-jsonschema-form` vocabulary.
 */
export type UiFieldOptions = {
  'ui:disabled'?: true;
  'ui:readonly'?: true;
  'ui:help'?: string;
  [nested: string]: unknown;
};

export type UiSchema = {
  'ui:submitButtonOptions': {
    submitText: string;
    norender: boolean;
  };
  [field: string]: unknown;
};

export type UiSchemaOptions = {
  /** @default 'Save Configuration' */
  submitText?: string;

  /**
   * Hide the renderer's own submit button (the host renders a confirm step).
   * @default true
   */
  hideSubmitButton?: boolean;

  /** @default 'This field is read-only and cannot be modified' */
  readonlyHelp?: string;
};

/**
 * Derives the companion UI schema of a synthesized schema.
 *
 * Every property gets an entry, nested like the schema's object
 * properties. Read-only properties are disabled and carry a help notice.
 * Array items are not descended into; a read-only array disables the whole
 * list.
 *
 * @param schema
 *   Output of `synthesizeSchema`.
 * @param options
 *   Labels for the generated entries.
 * @returns
 *   A UI schema for a JSON-Schema form renderer.
 */
export function deriveUiSchema(
  schema: RootSchema,
  options: UiSchemaOptions = {}
): UiSchema {
  const uiSchema: UiSchema = {
    'ui:submitButtonOptions': {
      submitText: options.submitText ?? 'Save Configuration',
      norender: options.hideSubmitButton ?? true
    }
  };

  const readonlyHelp =
    options.readonlyHelp ?? 'This field is read-only and cannot be modified';

  deriveProperties(uiSchema, schema.properties, readonlyHelp);
  return uiSchema;
}

/**
 * Adds one entry per property to `target`. Entries are defined as own
 * properties, so a `__proto__` field keeps its options.
 */
function deriveProperties(
  target: Record<string, unknown>,
  properties: Record<string, SchemaNode>,
  readonlyHelp: string
): void {
  for (const [key, property] of Object.entries(properties)) {
    const field: UiFieldOptions = {};

    if (property.readOnly) {
      field['ui:disabled'] = true;
      field['ui:readonly'] = true;
      field['ui:help'] = readonlyHelp;
    }

    if (property.type === 'object') {
      deriveProperties(field, property.properties, readonlyHelp);
    }

    defineEntry(target, key, field);
  }
}
