// ============================================================================
// SHARED TYPES - Comment Harvester
// ============================================================================

/**
 * Logical roles a strategy maps to markup locators
 */
export type FieldRole = 'container' | 'identity' | 'content' | 'metric';

/**
 * Named, ranked set of selectors, one per field role
 */
export interface Strategy {
  readonly name: string;
  readonly container: string;
  readonly identity: string;
  readonly content: string;
  readonly metric: string;
}

/**
 * One extracted comment
 */
export interface HarvestRecord {
  /** 1-based DOM position of the container within its item */
  readonly sequence: number;
  readonly itemId: string;
  readonly identity: string;
  readonly content: string;
  /** Non-negative integer */
  readonly metric: number;
  /** ISO-8601 timestamp */
  readonly extractedAt: string;
}

// Per-item lifecycle
export type ItemState =
  | 'pending'
  | 'navigating'
  | 'loading'
  | 'extracting'
  | 'completed'
  | 'failed';

/**
 * What to do when loading stagnates before the target count
 */
export type StagnationPolicy =
  | 'partial-success' // success when at least one record loaded (default)
  | 'always-success'  // stagnation always counts as success
  | 'failure';        // stagnation before target fails the item

export type LoadStopReason = 'target-reached' | 'stagnated' | 'max-iterations';

/**
 * Result of one load phase
 */
export interface LoadOutcome {
  success: boolean;
  reason: LoadStopReason;
  finalCount: number;
  iterations: number;
  streak: number;
}

/**
 * Terminal failure of one item
 */
export interface ItemFailure {
  itemId: string;
  /** State the item was in when it failed */
  stage: ItemState;
  errorType: string;
  message: string;
  attempts: number;
}

export interface HarvestRunResult {
  records: HarvestRecord[];
  failures: ItemFailure[];
}

export interface HarvestStatistics {
  totalRecords: number;
  uniqueIdentities: number;
  uniqueItems: number;
  metricSum: number;
  averagePerItem: number;
  topRecord: HarvestRecord | null;
  firstExtractedAt: string | null;
  lastExtractedAt: string | null;
  failedItems: number;
}

export type ExportFormat = 'xlsx' | 'json';
