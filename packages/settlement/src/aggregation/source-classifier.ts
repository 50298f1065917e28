import type { SourceBucket } from '../domain/types.js';

const SOURCE_BUCKETS: Record<string, SourceBucket> = {
  local_pv: 'local-pv',
  pv: 'local-pv',
  battery: 'battery',
  local_battery: 'battery',
  grid: 'grid',
};

/**
 * Trim, lower-case and use `_` as the word separator: `Local-PV ` → `local_pv`.
 */
export function normalizeSource(source: string): string {
  return source.trim().toLowerCase().replace(/-/g, '_');
}

/**
 * Map a raw source tag to its bucket. Unknown tags are `unclassified`; how those
 * are priced is the policy's `unclassified_source_policy`.
 */
export function classifySource(source: string): SourceBucket {
  return SOURCE_BUCKETS[normalizeSource(source)] ?? 'unclassified';
}
