import { describe, expect, test } from 'vitest';

import type { TestScenario } from './types';
import type { MergeResult, ValuesMapping } from '../types';
import { buildDescriptor, createLoggerSpy } from './helpers';
import { EMPTY_DESCRIPTOR } from '../descriptor/descriptor';
import { mergeValues } from '../merge';

type MergeInput = {
  current: ValuesMapping;
  update: ValuesMapping;
  descriptor?: unknown;
};

function runMerge(input: MergeInput): MergeResult {
  return mergeValues(
    input.current,
    input.update,
    buildDescriptor(input.descriptor ?? {})
  );
}

/**
 * Test suite: selective merge.
 *
 * Scope:
 * - Whole-value replacement and recursion.
 * - Read-only and enumeration protection.
 * - Preservation of keys absent from the update.
 * - Purity and structural sharing.
 */
describe('Selective merge', () => {
  describe('Protection rules', () => {
    const scenarios: TestScenario<MergeInput, MergeResult>[] = [
      {
        id: 'Read-only Leaf',
        description: 'A read-only field keeps its value; siblings are updated.',
        input: {
          current: { image: { repository: 'nginx', tag: '1.0' } },
          update: { image: { repository: 'custom', tag: '2.0' } },
          descriptor: { readonly: ['image.repository'] }
        },
        expected: {
          values: { image: { repository: 'nginx', tag: '2.0' } },
          applied: ['image.tag'],
          skipped: [{ path: 'image.repository', reason: 'readonly' }]
        }
      },
      {
        id: 'Read-only Mapping',
        description: 'A read-only mapping is skipped without visiting its children.',
        input: {
          current: { ingress: { host: 'a.test', tls: false } },
          update: { ingress: { host: 'b.test', tls: true } },
          descriptor: { readonly: ['ingress'] }
        },
        expected: {
          values: { ingress: { host: 'a.test', tls: false } },
          applied: [],
          skipped: [{ path: 'ingress', reason: 'readonly' }]
        }
      },
      {
        id: 'Enum Option List',
        description: 'An enum sequence is never replaced by the submitted selection.',
        input: {
          current: { environments: ['dev', 'staging', 'prod'], replicaCount: 1 },
          update: { environments: ['prod'], replicaCount: 3 },
          descriptor: { enum: ['environments'] }
        },
        expected: {
          values: { environments: ['dev', 'staging', 'prod'], replicaCount: 3 },
          applied: ['replicaCount'],
          skipped: [{ path: 'environments', reason: 'enum' }]
        }
      },
      {
        id: 'Enum Without Sequence',
        description: 'An enum path holding a scalar has no option list to protect.',
        input: {
          current: { environments: 'dev' },
          update: { environments: 'prod' },
          descriptor: { enum: ['environments'] }
        },
        expected: {
          values: { environments: 'prod' },
          applied: ['environments'],
          skipped: []
        }
      },
      {
        id: 'Nested Enum Path',
        description: 'Enum rules match the accumulated path, not the bare key.',
        input: {
          current: { region: { environments: ['eu'] }, environments: ['dev'] },
          update: { region: { environments: ['us'] }, environments: ['prod'] },
          descriptor: { enum: ['region.environments'] }
        },
        expected: {
          values: { region: { environments: ['eu'] }, environments: ['prod'] },
          applied: ['environments'],
          skipped: [{ path: 'region.environments', reason: 'enum' }]
        }
      },
      {
        id: 'Read-only Descendant',
        description: 'A scalar cannot replace a mapping holding a read-only entry.',
        input: {
          current: { image: { repository: 'nginx', tag: '1.0' } },
          update: { image: 'latest' },
          descriptor: { readonly: ['image.repository'] }
        },
        expected: {
          values: { image: { repository: 'nginx', tag: '1.0' } },
          applied: [],
          skipped: [{ path: 'image', reason: 'readonly' }]
        }
      },
      {
        id: 'Enum Descendant',
        description: 'Null cannot replace a mapping holding an enum option list.',
        input: {
          current: { deploy: { environments: ['dev', 'prod'] }, replicaCount: 1 },
          update: { deploy: null, replicaCount: 2 },
          descriptor: { enum: ['deploy.environments'] }
        },
        expected: {
          values: { deploy: { environments: ['dev', 'prod'] }, replicaCount: 2 },
          applied: ['replicaCount'],
          skipped: [{ path: 'deploy', reason: 'enum' }]
        }
      },
      {
        id: 'Deep Read-only Descendant',
        description: 'Protection is found at any depth below the replaced entry.',
        input: {
          current: { app: { image: { repository: 'nginx' } } },
          update: { app: [] },
          descriptor: { readonly: ['app.image.repository'] }
        },
        expected: {
          values: { app: { image: { repository: 'nginx' } } },
          applied: [],
          skipped: [{ path: 'app', reason: 'readonly' }]
        }
      },
      {
        id: 'Absent Protected Descendant',
        description: 'A rule for an entry the current mapping lacks does not block replacement.',
        input: {
          current: { image: { tag: '1.0' } },
          update: { image: 'latest' },
          descriptor: { readonly: ['image.repository'], enum: ['image.tags'] }
        },
        expected: {
          values: { image: 'latest' },
          applied: ['image'],
          skipped: []
        }
      },
      {
        id: 'Read-only In New Mapping',
        description: 'A new mapping is merged into an empty one, so read-only entries are not created.',
        input: {
          current: {},
          update: { image: { repository: 'custom', tag: '2.0' } },
          descriptor: { readonly: ['image.repository'] }
        },
        expected: {
          values: { image: { tag: '2.0' } },
          applied: ['image.tag'],
          skipped: [{ path: 'image.repository', reason: 'readonly' }]
        }
      },
      {
        id: 'Read-only In Mapping Over Scalar',
        description: 'A scalar is kept when every entry of the mapping replacing it is read-only.',
        input: {
          current: { image: 'nginx' },
          update: { image: { repository: 'custom' } },
          descriptor: { readonly: ['image.repository'] }
        },
        expected: {
          values: { image: 'nginx' },
          applied: [],
          skipped: [{ path: 'image.repository', reason: 'readonly' }]
        }
      },
      {
        id: 'Read-only Wins Over Enum',
        description: 'A path that is both read-only and enum reports read-only.',
        input: {
          current: { environments: ['dev'] },
          update: { environments: ['prod'] },
          descriptor: { readonly: ['environments'], enum: ['environments'] }
        },
        expected: {
          values: { environments: ['dev'] },
          applied: [],
          skipped: [{ path: 'environments', reason: 'readonly' }]
        }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(runMerge(input)).toStrictEqual(expected);
    });
  });

  describe('Replacement and recursion', () => {
    const scenarios: TestScenario<MergeInput, MergeResult>[] = [
      {
        id: 'Untouched Keys',
        description: 'Keys absent from the update are preserved at every depth.',
        input: {
          current: {
            image: { repository: 'nginx', tag: '1.0', pullPolicy: 'Always' },
            service: { port: 80 }
          },
          update: { image: { tag: '1.1' } }
        },
        expected: {
          values: {
            image: { repository: 'nginx', tag: '1.1', pullPolicy: 'Always' },
            service: { port: 80 }
          },
          applied: ['image.tag'],
          skipped: []
        }
      },
      {
        id: 'Atomic Arrays',
        description: 'Arrays are replaced wholesale, never merged by index.',
        input: {
          current: { servers: [{ name: 'a', port: 80 }, { name: 'b', port: 81 }] },
          update: { servers: [{ name: 'c' }] }
        },
        expected: {
          values: { servers: [{ name: 'c' }] },
          applied: ['servers'],
          skipped: []
        }
      },
      {
        id: 'New Key',
        description: 'A key missing from the current tree is added.',
        input: {
          current: { image: { tag: '1.0' } },
          update: { image: { digest: 'sha256:0' }, podLabels: { team: 'web' } }
        },
        expected: {
          values: {
            image: { tag: '1.0', digest: 'sha256:0' },
            podLabels: { team: 'web' }
          },
          applied: ['image.digest', 'podLabels'],
          skipped: []
        }
      },
      {
        id: 'Type Switch',
        description: 'A mapping replaced by a scalar is a whole-value replacement.',
        input: {
          current: { resources: { limits: { cpu: '1' } } },
          update: { resources: null }
        },
        expected: {
          values: { resources: null },
          applied: ['resources'],
          skipped: []
        }
      },
      {
        id: 'Empty Update',
        description: 'An empty update changes nothing.',
        input: {
          current: { replicaCount: 1 },
          update: {}
        },
        expected: {
          values: { replicaCount: 1 },
          applied: [],
          skipped: []
        }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(runMerge(input)).toStrictEqual(expected);
    });
  });

  describe('Path normalization', () => {
    test('indexed rule keys protect the un-indexed update path', () => {
      const result = runMerge({
        current: { servers: { port: 80 } },
        update: { servers: { port: 8080 } },
        descriptor: { readonly: ['servers[0].port'] }
      });

      expect(result.values).toStrictEqual({ servers: { port: 80 } });
      expect(result.skipped).toStrictEqual([{ path: 'servers.port', reason: 'readonly' }]);
    });
  });

  describe('Purity', () => {
    test('inputs are never mutated', () => {
      const current: ValuesMapping = {
        image: { repository: 'nginx', tag: '1.0' },
        environments: ['dev', 'prod']
      };
      const update: ValuesMapping = {
        image: { repository: 'custom', tag: '2.0' },
        environments: ['prod']
      };
      const currentSnapshot = structuredClone(current);
      const updateSnapshot = structuredClone(update);

      mergeValues(
        current,
        update,
        buildDescriptor({ readonly: ['image.repository'], enum: ['environments'] })
      );

      expect(current).toStrictEqual(currentSnapshot);
      expect(update).toStrictEqual(updateSnapshot);
    });

    test('unchanged subtrees are shared and changed ones are copied', () => {
      const service = { port: 80 };
      const image = { repository: 'nginx', tag: '1.0' };
      const current: ValuesMapping = { service, image };

      const { values } = mergeValues(current, { image: { tag: '2.0' } }, EMPTY_DESCRIPTOR);

      expect(values).not.toBe(current);
      expect(values.service).toBe(service);
      expect(values.image).not.toBe(image);
    });

    test('a fully skipped update returns the current tree itself', () => {
      const current: ValuesMapping = { image: { repository: 'nginx' } };

      const { values } = mergeValues(
        current,
        { image: { repository: 'custom' } },
        buildDescriptor({ readonly: ['image.repository'] })
      );

      expect(values).toBe(current);
    });

    test('a __proto__ key is written as data, not as a prototype', () => {
      const update: ValuesMapping = JSON.parse('{"__proto__": {"polluted": true}}');

      const { values, applied } = mergeValues({}, update, EMPTY_DESCRIPTOR);

      expect(applied).toStrictEqual(['__proto__']);
      expect(Object.getPrototypeOf(values)).toBe(Object.prototype);
      expect(Object.hasOwn(values, '__proto__')).toBe(true);
    });
  });

  describe('Reporting', () => {
    test('each skip is logged at info level', () => {
      const logger = createLoggerSpy();

      mergeValues(
        { image: { repository: 'nginx' }, environments: ['dev'] },
        { image: { repository: 'custom' }, environments: ['prod'] },
        buildDescriptor({ readonly: ['image.repository'], enum: ['environments'] }),
        { logger }
      );

      expect(logger.info.mock.calls).toStrictEqual([
        [{ path: 'image.repository', reason: 'readonly' }, 'Skipped protected field'],
        [{ path: 'environments', reason: 'enum' }, 'Skipped protected field']
      ]);
    });
  });
});
