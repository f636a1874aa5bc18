// ============================================================================
// RESULT COLLECTION
// ============================================================================

import type { HarvestRecord, HarvestRunResult, ItemFailure } from '../../shared/types.js';

/**
 * Append-only store of records and failed items. All workers commit through
 * `commitRecords` and `commitFailure`, each applied synchronously, so the
 * records of one item stay contiguous.
 */
export class ResultCollection {
  private records: HarvestRecord[] = [];
  private failures: ItemFailure[] = [];

  commitRecords(records: readonly HarvestRecord[]): void {
    this.records.push(...records);
  }

  commitFailure(failure: ItemFailure): void {
    this.failures.push(Object.freeze({ ...failure }));
  }

  get recordCount(): number {
    return this.records.length;
  }

  get failureCount(): number {
    return this.failures.length;
  }

  failedItemIds(): string[] {
    return this.failures.map((f) => f.itemId);
  }

  /**
   * Copy of everything committed so far
   */
  snapshot(): HarvestRunResult {
    return {
      records: [...this.records],
      failures: [...this.failures],
    };
  }
}
