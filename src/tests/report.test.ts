import { describe, expect, test } from 'vitest';

import type { SkipNotice } from '../types';
import { formatSkipSummary } from '../report';

describe('formatSkipSummary', () => {
  const skipped: SkipNotice[] = [
    { path: 'image.repository', reason: 'readonly' },
    { path: 'environments', reason: 'enum' },
    { path: 'ingress.host', reason: 'readonly' }
  ];

  test('returns undefined when nothing was skipped', () => {
    expect(formatSkipSummary([])).toBeUndefined();
  });

  test('counts reasons and previews paths', () => {
    expect(formatSkipSummary(skipped)).toBe(
      'Skipped 3 protected fields (readonly=2, enum=1); preview: ' +
        '"image.repository" (readonly), "environments" (enum), "ingress.host" (readonly)'
    );
  });

  test('truncates the preview', () => {
    expect(formatSkipSummary(skipped, { maxPreviewPaths: 1 })).toBe(
      'Skipped 3 protected fields (readonly=2, enum=1); preview: ' +
        '"image.repository" (readonly), … (2 more)'
    );
  });

  test('omits the preview when disabled', () => {
    expect(formatSkipSummary(skipped.slice(0, 1), { maxPreviewPaths: 0 })).toBe(
      'Skipped 1 protected field (readonly=1)'
    );
  });
});
