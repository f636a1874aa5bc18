// ============================================================================
// SCROLL/LOAD CONTROLLER
// ============================================================================
// Drives incremental loading through human-like scrolling and "load more"
// clicks, and decides when to stop: target reached, stagnation, or the
// iteration cap

import type { LoadOutcome, LoadStopReason, StagnationPolicy, Strategy } from '../../../shared/types.js';
import type { RenderingSurface } from '../../surface/RenderingSurface.js';
import type { Logger } from '../../utils/logger.js';
import { silentLogger } from '../../utils/logger.js';
import { probeCount } from '../StrategyResolver.js';
import { DEFAULT_STRATEGIES, countProbeSelectors, readinessSelectors } from '../strategies.js';
import { errorMessage } from '../types/errors.js';
import { attempt } from '../types/step.js';
import type { PacingConfig } from '../utils/pacing.js';
import { DEFAULT_PACING, Pacer } from '../utils/pacing.js';
import { HumanScroller } from './HumanScroller.js';
import { LoadMoreHandler } from './LoadMoreHandler.js';

/**
 * Configuration for load handling
 */
export interface ScrollLoadConfig {
  /** Maximum load iterations (default: 100) */
  maxIterations?: number;
  /** Consecutive unchanged probes before giving up (default: 5) */
  stagnationThreshold?: number;
  /** Whether stopping short of the target counts as success (default: 'partial-success') */
  stagnationPolicy?: StagnationPolicy;
  /** How long awaitContent waits for the first records in ms (default: 15000) */
  readinessTimeout?: number;
  pacing?: PacingConfig;
}

const DEFAULT_CONFIG: Required<ScrollLoadConfig> = {
  maxIterations: 100,
  stagnationThreshold: 5,
  stagnationPolicy: 'partial-success',
  readinessTimeout: 15000,
  pacing: DEFAULT_PACING,
};

export interface ScrollLoadDependencies {
  pacer?: Pacer;
  logger?: Logger;
  strategies?: readonly Strategy[];
}

/**
 * Per-item load progress; lives only for one loadUntil call
 */
interface LoadState {
  current: number;
  previous: number;
  streak: number;
  iterations: number;
}

/**
 * Decide whether a load that stopped short of its target succeeded
 */
export function acceptsPartialLoad(policy: StagnationPolicy, count: number): boolean {
  switch (policy) {
    case 'always-success':
      return true;
    case 'failure':
      return false;
    case 'partial-success':
      return count > 0;
  }
}

export class ScrollLoadController<E> {
  private config: Required<ScrollLoadConfig>;
  private pacer: Pacer;
  private logger: Logger;
  private probeSelectors: string[];
  private readySelectors: string[];
  private scroller: HumanScroller<E>;
  private loadMore: LoadMoreHandler<E>;

  constructor(
    private surface: RenderingSurface<E>,
    config: ScrollLoadConfig = {},
    deps: ScrollLoadDependencies = {}
  ) {
    // Filter out undefined values so they don't override defaults
    const cleanConfig: ScrollLoadConfig = Object.fromEntries(
      Object.entries(config).filter(([, v]) => v !== undefined)
    );
    this.config = { ...DEFAULT_CONFIG, ...cleanConfig };
    this.pacer = deps.pacer ?? new Pacer();
    this.logger = deps.logger ?? silentLogger;

    const strategies = deps.strategies ?? DEFAULT_STRATEGIES;
    this.probeSelectors = countProbeSelectors(strategies);
    this.readySelectors = readinessSelectors(strategies);
    this.scroller = new HumanScroller(surface, this.pacer, this.config.pacing);
    this.loadMore = new LoadMoreHandler(surface, this.pacer, this.config.pacing);
  }

  /**
   * Poll until any comment-like element exists or the timeout passes.
   * Resolves to whether content appeared.
   */
  async awaitContent(timeoutMs: number = this.config.readinessTimeout): Promise<boolean> {
    const interval = Math.max(1, this.config.pacing.contentPoll);
    const polls = Math.max(1, Math.ceil(timeoutMs / interval));

    for (let poll = 0; poll < polls; poll++) {
      const probe = await attempt(() => probeCount(this.surface, this.readySelectors));
      if (probe.ok && probe.value > 0) return true;
      await this.pacer.waitExactly(interval);
    }

    this.logger.warn(`No comment elements appeared within ${timeoutMs}ms`);
    return false;
  }

  /**
   * Load until `targetCount` records are present, the count stagnates for
   * `stagnationThreshold` consecutive probes, or `maxIterations` pass.
   */
  async loadUntil(
    targetCount: number,
    maxIterations: number = this.config.maxIterations,
    stagnationThreshold: number = this.config.stagnationThreshold
  ): Promise<LoadOutcome> {
    const state: LoadState = { current: 0, previous: 0, streak: 0, iterations: 0 };

    while (state.iterations < maxIterations) {
      state.current = await this.countRecords(state.previous);

      if (state.current >= targetCount) {
        this.logger.info(`Target reached: ${state.current}/${targetCount} records`);
        return this.finish(state, 'target-reached', true);
      }

      if (state.current === state.previous) {
        state.streak++;
        if (state.streak >= stagnationThreshold) {
          this.logger.info(`No new records after ${state.streak} checks, stopping at ${state.current}`);
          return this.finish(state, 'stagnated', acceptsPartialLoad(this.config.stagnationPolicy, state.current));
        }
      } else {
        state.streak = 0;
        state.previous = state.current;
      }

      await this.interact();

      state.iterations++;
      if (state.iterations % 10 === 0) {
        this.logger.info(`Iteration ${state.iterations}: ${state.current} records loaded`);
      }

      await this.pacer.wait(this.config.pacing.iteration);
    }

    this.logger.info(`Reached iteration cap (${maxIterations}) with ${state.current} records`);
    return this.finish(state, 'max-iterations', acceptsPartialLoad(this.config.stagnationPolicy, state.current));
  }

  /**
   * Current record count; a failed probe reports the last known count
   */
  private async countRecords(fallback: number): Promise<number> {
    const probe = await attempt(() => probeCount(this.surface, this.probeSelectors));
    if (probe.ok) return probe.value;

    this.logger.debug(`Count probe failed: ${errorMessage(probe.error)}`);
    return fallback;
  }

  private async interact(): Promise<void> {
    const scroll = await attempt(() => this.scroller.scrollOnce());
    if (!scroll.ok) {
      this.logger.debug(`Scroll step failed: ${errorMessage(scroll.error)}`);
    }

    const click = await attempt(() => this.loadMore.tryLoadMore());
    if (!click.ok) {
      this.logger.debug(`Load-more step failed: ${errorMessage(click.error)}`);
    } else if (click.value) {
      this.logger.debug(`Clicked load-more control ${click.value}`);
    }
  }

  private finish(state: LoadState, reason: LoadStopReason, success: boolean): LoadOutcome {
    return {
      success,
      reason,
      finalCount: state.current,
      iterations: state.iterations,
      streak: state.streak,
    };
  }
}
