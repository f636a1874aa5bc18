// ============================================================================
// BATCH ORCHESTRATOR
// ============================================================================
// Runs each item through navigate -> load -> extract in its own browser
// session, isolates per-item failures, paces between items

import { EventEmitter } from 'events';
import type {
  HarvestRecord,
  HarvestRunResult,
  ItemFailure,
  ItemState,
  Strategy,
} from '../../shared/types.js';
import type { RenderingSurface, SessionFactory } from '../surface/RenderingSurface.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import type { ScrollLoadConfig } from './handlers/ScrollLoadController.js';
import { ScrollLoadController } from './handlers/ScrollLoadController.js';
import { RecordExtractor } from './RecordExtractor.js';
import { ResultCollection } from './ResultCollection.js';
import { DEFAULT_STRATEGIES } from './strategies.js';
import type { RetryConfig } from './types/errors.js';
import {
  DEFAULT_RETRY_CONFIG,
  LoadStagnationError,
  calculateRetryDelay,
  errorMessage,
  wrapError,
} from './types/errors.js';
import { attempt } from './types/step.js';
import type { PacingConfig, RandomSource, Sleep } from './utils/pacing.js';
import { DEFAULT_PACING, Pacer, realSleep } from './utils/pacing.js';

export interface OrchestratorConfig {
  /** Independent item pipelines, each with its own sessions (default: 1) */
  workers?: number;
  load?: Omit<ScrollLoadConfig, 'pacing'>;
  pacing?: PacingConfig;
  retry?: Partial<RetryConfig>;
}

export interface OrchestratorDependencies<E> {
  sessions: SessionFactory<E>;
  logger?: Logger;
  sleep?: Sleep;
  random?: RandomSource;
  now?: () => Date;
  strategies?: readonly Strategy[];
}

export interface ItemStateEvent {
  itemId: string;
  state: ItemState;
  attempt: number;
}

export interface ItemRetryEvent {
  itemId: string;
  attempt: number;
  delay: number;
  message: string;
}

type PipelineOutcome =
  | { ok: true; records: HarvestRecord[] }
  | { ok: false; stage: ItemState; error: unknown };

/**
 * Emits:
 * - `item:state` (ItemStateEvent) on every state transition
 * - `item:retry` (ItemRetryEvent) before a retry attempt
 * - `item:completed` ({ itemId, records }) and `item:failed` (ItemFailure)
 */
export class BatchOrchestrator<E> extends EventEmitter {
  private sessions: SessionFactory<E>;
  private logger: Logger;
  private pacer: Pacer;
  private pacing: PacingConfig;
  private retry: RetryConfig;
  private workers: number;
  private loadConfig: ScrollLoadConfig;
  private strategies: readonly Strategy[];
  private now: () => Date;
  private collection = new ResultCollection();

  constructor(deps: OrchestratorDependencies<E>, config: OrchestratorConfig = {}) {
    super();
    this.sessions = deps.sessions;
    this.logger = deps.logger ?? silentLogger;
    this.pacer = new Pacer(deps.sleep ?? realSleep, deps.random ?? Math.random);
    this.now = deps.now ?? (() => new Date());
    this.strategies = deps.strategies ?? DEFAULT_STRATEGIES;
    this.pacing = config.pacing ?? DEFAULT_PACING;
    this.retry = { ...DEFAULT_RETRY_CONFIG, ...config.retry };
    this.workers = Math.max(1, Math.floor(config.workers ?? 1));
    this.loadConfig = { ...config.load, pacing: this.pacing };
  }

  /**
   * Records and failures committed so far in the current run
   */
  snapshot(): HarvestRunResult {
    return this.collection.snapshot();
  }

  /**
   * Harvest every item. Per-item errors end up in `failures`; this never
   * rejects because of an item.
   */
  async run(items: readonly string[], perItemTarget: number): Promise<HarvestRunResult> {
    this.collection = new ResultCollection();
    const workerCount = Math.min(this.workers, Math.max(1, items.length));
    let next = 0;

    this.logger.info(`Harvesting ${items.length} items with ${workerCount} worker(s), target ${perItemTarget} each`);

    const work = async (): Promise<void> => {
      while (next < items.length) {
        const index = next++;
        const itemId = items[index];
        this.logger.info(`Item ${index + 1}/${items.length}: ${itemId}`);

        await this.processItem(itemId, perItemTarget);

        if (next < items.length) {
          const delay = await this.pacer.wait(this.pacing.interItem);
          this.logger.debug(`Waited ${delay}ms before next item`);
        }
      }
    };

    await Promise.all(Array.from({ length: workerCount }, () => work()));

    const result = this.collection.snapshot();
    this.logger.info(
      `Run finished: ${result.records.length} records, ${result.failures.length} failed item(s)`
    );
    return result;
  }

  /**
   * Bounded retry around the per-item state machine
   */
  private async processItem(itemId: string, target: number): Promise<void> {
    for (let attemptNo = 1; ; attemptNo++) {
      const outcome = await this.runPipeline(itemId, target, attemptNo);

      if (outcome.ok) {
        this.collection.commitRecords(outcome.records);
        this.transition(itemId, 'completed', attemptNo);
        this.emit('item:completed', { itemId, records: outcome.records });
        this.logger.info(`Collected ${outcome.records.length} records from ${itemId}`);
        return;
      }

      const error = wrapError(outcome.error, { itemId }, this.retry);
      if (error.retriable && attemptNo <= this.retry.maxRetries) {
        const delay = calculateRetryDelay(attemptNo - 1, this.retry);
        this.logger.warn(`Attempt ${attemptNo} for ${itemId} failed (${error.type}), retrying in ${delay}ms`);
        this.emit('item:retry', { itemId, attempt: attemptNo, delay, message: error.message } satisfies ItemRetryEvent);
        await this.pacer.waitExactly(delay);
        continue;
      }

      const failure: ItemFailure = {
        itemId,
        stage: outcome.stage,
        errorType: error.type,
        message: error.message,
        attempts: attemptNo,
      };
      this.collection.commitFailure(failure);
      this.transition(itemId, 'failed', attemptNo);
      this.emit('item:failed', failure);
      this.logger.error(`Item failed during ${outcome.stage}: ${itemId}: ${error.message}`);
      return;
    }
  }

  /**
   * navigate -> load -> extract in a fresh session, released on every path
   */
  private async runPipeline(itemId: string, target: number, attemptNo: number): Promise<PipelineOutcome> {
    let stage: ItemState = 'pending';
    const enter = (state: ItemState): void => {
      stage = state;
      this.transition(itemId, state, attemptNo);
    };

    let surface: RenderingSurface<E> | undefined;
    try {
      enter('navigating');
      surface = await this.sessions.create();
      await surface.navigate(itemId);
      await this.pacer.wait(this.pacing.settle);

      enter('loading');
      const controller = new ScrollLoadController(surface, this.loadConfig, {
        pacer: this.pacer,
        logger: this.logger.child('ScrollLoadController'),
        strategies: this.strategies,
      });
      await controller.awaitContent();
      const load = await controller.loadUntil(target);
      if (!load.success) {
        throw new LoadStagnationError(
          `Loading stopped (${load.reason}) with ${load.finalCount} records`,
          load.finalCount,
          load.iterations
        );
      }

      enter('extracting');
      const extractor = new RecordExtractor(surface, {
        strategies: this.strategies,
        logger: this.logger.child('RecordExtractor'),
        now: this.now,
      });
      const records = await extractor.extractAll(itemId);
      return { ok: true, records };
    } catch (error) {
      return { ok: false, stage, error };
    } finally {
      if (surface) await this.release(surface, itemId);
    }
  }

  private async release(surface: RenderingSurface<E>, itemId: string): Promise<void> {
    const closed = await attempt(() => surface.close());
    if (!closed.ok) {
      this.logger.warn(`Failed to release session for ${itemId}: ${errorMessage(closed.error)}`);
    }
  }

  private transition(itemId: string, state: ItemState, attemptNo: number): void {
    this.emit('item:state', { itemId, state, attempt: attemptNo } satisfies ItemStateEvent);
  }
}
