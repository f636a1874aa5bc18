// ============================================================================
// HARVEST STATISTICS
// ============================================================================

import type { HarvestRecord, HarvestStatistics, ItemFailure } from '../../shared/types.js';

/**
 * Summary figures over a finished (or interrupted) run
 */
export function computeStatistics(
  records: readonly HarvestRecord[],
  failures: readonly ItemFailure[] = []
): HarvestStatistics {
  const identities = new Set(records.map((r) => r.identity));
  const items = new Set(records.map((r) => r.itemId));
  const metricSum = records.reduce((sum, r) => sum + r.metric, 0);

  let topRecord: HarvestRecord | null = null;
  for (const record of records) {
    if (!topRecord || record.metric > topRecord.metric) {
      topRecord = record;
    }
  }

  const timestamps = records.map((r) => r.extractedAt).sort();

  return {
    totalRecords: records.length,
    uniqueIdentities: identities.size,
    uniqueItems: items.size,
    metricSum,
    averagePerItem: items.size > 0 ? Math.round((records.length / items.size) * 100) / 100 : 0,
    topRecord,
    firstExtractedAt: timestamps[0] ?? null,
    lastExtractedAt: timestamps[timestamps.length - 1] ?? null,
    failedItems: new Set(failures.map((f) => f.itemId)).size,
  };
}

/**
 * "first 50 chars... (N likes)"
 */
export function describeTopRecord(record: HarvestRecord | null): string {
  if (!record) return '-';
  const preview = record.content.length > 50 ? `${record.content.slice(0, 50)}...` : record.content;
  return `${preview} (${record.metric} likes)`;
}
