// ============================================================================
// PACING UTILITY
// ============================================================================
// Randomized human-like delays. Sleep and randomness are injectable so tests
// run instantly and deterministically.

export type Sleep = (ms: number) => Promise<void>;

/** Returns a float in [0, 1) */
export type RandomSource = () => number;

export type Range = readonly [min: number, max: number];

export const realSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Random integer in [min, max], inclusive
 */
export function randomInt(min: number, max: number, random: RandomSource = Math.random): number {
  if (max <= min) return min;
  const value = min + Math.floor(random() * (max - min + 1));
  return Math.min(value, max);
}

/**
 * Random element of a non-empty list
 */
export function pick<T>(items: readonly T[], random: RandomSource = Math.random): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty list');
  }
  return items[randomInt(0, items.length - 1, random)];
}

/**
 * Delay ranges in milliseconds
 */
export interface PacingConfig {
  /** After navigation, before loading starts */
  settle: Range;
  /** End of every load iteration */
  iteration: Range;
  /** Between scrolling a load-more button into view and clicking it */
  beforeLoadMoreClick: Range;
  /** After a successful load-more click */
  afterLoadMoreClick: Range;
  /** Between items of one worker */
  interItem: Range;
  /** Between sub-steps of a smooth scroll */
  smoothStep: Range;
  /** Between wheel ticks */
  wheelTick: Range;
  /** Poll interval while waiting for content to appear */
  contentPoll: number;
}

export const DEFAULT_PACING: PacingConfig = {
  settle: [3000, 6000],
  iteration: [1500, 4000],
  beforeLoadMoreClick: [500, 500],
  afterLoadMoreClick: [2000, 4000],
  interItem: [5000, 15000],
  smoothStep: [50, 150],
  wheelTick: [100, 300],
  contentPoll: 500,
};

/**
 * Sleeps for random durations drawn from configured ranges
 */
export class Pacer {
  constructor(
    private sleep: Sleep = realSleep,
    private random: RandomSource = Math.random
  ) {}

  /** Sleep a random duration within `range`; resolves to the chosen delay */
  async wait(range: Range): Promise<number> {
    const delay = randomInt(range[0], range[1], this.random);
    await this.sleep(delay);
    return delay;
  }

  async waitExactly(ms: number): Promise<void> {
    await this.sleep(ms);
  }

  int(min: number, max: number): number {
    return randomInt(min, max, this.random);
  }

  pick<T>(items: readonly T[]): T {
    return pick(items, this.random);
  }
}
