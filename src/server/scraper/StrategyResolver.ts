// ============================================================================
// STRATEGY RESOLVER
// ============================================================================

import type { Strategy } from '../../shared/types.js';
import type { RenderingSurface } from '../surface/RenderingSurface.js';

export interface ResolvedStrategy<E> {
  strategy: Strategy;
  /** Containers in DOM order */
  containers: E[];
}

/**
 * Pick the first strategy whose container selector matches at least one
 * element. Depends only on the current DOM, so the same snapshot always
 * resolves to the same strategy and container order.
 */
export async function resolveStrategy<E>(
  surface: RenderingSurface<E>,
  strategies: readonly Strategy[]
): Promise<ResolvedStrategy<E> | null> {
  for (const strategy of strategies) {
    const containers = await surface.querySelectorAll(strategy.container);
    if (containers.length > 0) {
      return { strategy, containers };
    }
  }
  return null;
}

/**
 * Count of the first selector with any matches, 0 when none match
 */
export async function probeCount<E>(
  surface: RenderingSurface<E>,
  selectors: readonly string[]
): Promise<number> {
  for (const selector of selectors) {
    const count = await surface.count(selector);
    if (count > 0) return count;
  }
  return 0;
}
