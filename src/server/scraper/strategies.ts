// ============================================================================
// SELECTOR STRATEGIES
// ============================================================================
// Ranked from most specific and stable to most generic (substring matches)

import type { Strategy } from '../../shared/types.js';

export const DEFAULT_STRATEGIES: readonly Strategy[] = Object.freeze([
  Object.freeze({
    name: 'data-e2e',
    container: '[data-e2e="comment-item"]',
    identity: '[data-e2e="comment-username"]',
    content: '[data-e2e="comment-level-1"]',
    metric: '[data-e2e="comment-like-count"]',
  }),
  Object.freeze({
    name: 'class',
    container: '.comment-item',
    identity: '.username',
    content: '.comment-content',
    metric: '.like-count',
  }),
  Object.freeze({
    name: 'generic',
    container: '[class*="comment"]',
    identity: '[class*="username"]',
    content: '[class*="text"]',
    metric: '[class*="like"]',
  }),
]);

/**
 * Generic fallbacks tried after the strategy's own field selector
 */
export const FIELD_FALLBACKS = {
  identity: ['.username', '[class*="username"]', 'a'],
  content: ['.comment-content', '[class*="text"]', 'span'],
  metric: ['.like-count', '[class*="like"]', '[data-testid*="like"]'],
} as const satisfies Record<'identity' | 'content' | 'metric', readonly string[]>;

export const UNKNOWN_IDENTITY = 'unknown user';
export const UNAVAILABLE_CONTENT = 'content unavailable';

/**
 * Extra selectors for the cheap count probe, after the strategy containers
 */
export const COUNT_PROBE_EXTRAS = ['.tiktok-comment'];

/**
 * Extra selectors that signal the comment area has rendered
 */
export const READINESS_EXTRAS = ['[data-testid="comment"]'];

/**
 * "Load more" affordances, in preference order
 */
export const LOAD_MORE_SELECTORS = [
  '[data-e2e="load-more-comment"]',
  '.load-more',
  '[class*="load-more"]',
  'button[class*="more"]',
  '[data-testid="load-more"]',
];

/**
 * Field selector chain for one role: the strategy's selector first, then the
 * generic fallbacks, without duplicates
 */
export function fieldChain(strategy: Strategy, role: keyof typeof FIELD_FALLBACKS): string[] {
  return [...new Set([strategy[role], ...FIELD_FALLBACKS[role]])];
}

/**
 * Selectors used to count loaded records
 */
export function countProbeSelectors(strategies: readonly Strategy[]): string[] {
  return [...new Set([...strategies.map((s) => s.container), ...COUNT_PROBE_EXTRAS])];
}

export function readinessSelectors(strategies: readonly Strategy[]): string[] {
  return [...countProbeSelectors(strategies), ...READINESS_EXTRAS];
}
