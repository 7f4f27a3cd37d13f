import { describe, expect, test } from 'vitest';

import type { ValuesMapping } from '../types';
import { buildDescriptor } from './helpers';
import { synthesizeSchema } from '../synthesizer';
import { deriveUiSchema } from '../ui-schema';

describe('deriveUiSchema', () => {
  const schema = synthesizeSchema(
    {
      image: { repository: 'nginx', tag: '1.0' },
      ingress: { host: 'example.test' },
      replicaCount: 1
    },
    buildDescriptor({ readonly: ['image.repository', 'ingress'] })
  );

  test('disables read-only properties at every depth', () => {
    expect(deriveUiSchema(schema)).toStrictEqual({
      'ui:submitButtonOptions': { submitText: 'Save Configuration', norender: true },
      image: {
        repository: {
          'ui:disabled': true,
          'ui:readonly': true,
          'ui:help': 'This field is read-only and cannot be modified'
        },
        tag: {}
      },
      ingress: {
        'ui:disabled': true,
        'ui:readonly': true,
        'ui:help': 'This field is read-only and cannot be modified',
        host: {}
      },
      replicaCount: {}
    });
  });

  test('labels are configurable', () => {
    const uiSchema = deriveUiSchema(schema, {
      submitText: 'Apply',
      hideSubmitButton: false,
      readonlyHelp: 'Locked'
    });

    expect(uiSchema['ui:submitButtonOptions']).toStrictEqual({
      submitText: 'Apply',
      norender: false
    });
    expect(uiSchema.ingress).toMatchObject({ 'ui:help': 'Locked' });
  });

  test('a __proto__ field keeps its entry as an own property', () => {
    const values: ValuesMapping = JSON.parse('{"__proto__": {"x": 1}}');

    const uiSchema = deriveUiSchema(
      synthesizeSchema(values, buildDescriptor({ readonly: ['__proto__.x'] }))
    );

    expect(Object.getPrototypeOf(uiSchema)).toBe(Object.prototype);
    expect(Object.getOwnPropertyDescriptor(uiSchema, '__proto__')?.value).toStrictEqual({
      x: {
        'ui:disabled': true,
        'ui:readonly': true,
        'ui:help': 'This field is read-only and cannot be modified'
      }
    });
  });
});
