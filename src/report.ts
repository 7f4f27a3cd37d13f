import type { SkipNotice, SkipReason } from './types';

export type SkipSummaryOptions = {
  /**
   * Maximum number of specific paths to list in the preview.
   * `0` disables the preview.
   * @default 5
   */
  maxPreviewPaths?: number;
};

/**
 * Formats the skip notices of a merge into one human-readable line.
 *
 * @param skipped - Skip notices in traversal order
 * @param options - Preview configuration
 * @returns Summary line (e.g.
 *          `Skipped 3 protected fields (readonly=2, enum=1); preview:
 *           "image.repository" (readonly), … (2 more)`);
 *          undefined if nothing was skipped
 */
export function formatSkipSummary(
  skipped: readonly SkipNotice[],
  options: SkipSummaryOptions = {}
): string | undefined {
  if (skipped.length === 0) return undefined;

  const noun = skipped.length === 1 ? 'field' : 'fields';
  const parts = [
    `Skipped ${skipped.length} protected ${noun} (${formatReasonDistribution(skipped)})`
  ];

  const previewLimit = options.maxPreviewPaths ?? 5;
  const preview = formatPathPreview(skipped, previewLimit);
  if (preview) parts.push(preview);

  return parts.join('; ');
}

/**
 * Counts notices per reason, in order of first appearance
 * (e.g. "readonly=2, enum=1").
 */
function formatReasonDistribution(skipped: readonly SkipNotice[]): string {
  const countByReason = new Map<SkipReason, number>();

  for (const notice of skipped) {
    countByReason.set(notice.reason, (countByReason.get(notice.reason) ?? 0) + 1);
  }

  return Array.from(countByReason.entries())
    .map(([reason, count]) => `${reason}=${count}`)
    .join(', ');
}

/**
 * Lists the first `limit` skipped paths with their reasons.
 *
 * @returns Preview string; undefined if the limit disables the preview
 */
function formatPathPreview(
  skipped: readonly SkipNotice[],
  limit: number
): string | undefined {
  if (limit <= 0) return undefined;

  const items = skipped
    .slice(0, limit)
    .map(notice => `"${notice.path}" (${notice.reason})`);

  // Truncation indicator
  if (skipped.length > limit) {
    items.push(`… (${skipped.length - limit} more)`);
  }

  return `preview: ${items.join(', ')}`;
}
