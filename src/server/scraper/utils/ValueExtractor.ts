// ============================================================================
// VALUE EXTRACTOR UTILITY
// ============================================================================
// Resolves field values through ordered selector chains on a rendering surface

import type { RenderingSurface } from '../../surface/RenderingSurface.js';

export interface FieldMatch<T> {
  value: T;
  /** Selector that produced the value */
  selector: string;
}

/**
 * Trim and collapse whitespace
 */
export function normalizeText(text: string | null | undefined): string {
  return text ? text.trim().replace(/\s+/g, ' ') : '';
}

/**
 * Remove every occurrence of `needle` from `text`, then normalize
 */
export function removeAll(text: string, needle: string): string {
  if (!needle) return normalizeText(text);
  return normalizeText(text.split(needle).join(''));
}

/**
 * Walk `selectors` in order inside `scope` and return the first value
 * `accept` takes. Only the first match of each selector is read.
 *
 * Returns null when no selector yields an accepted value. Surface errors
 * propagate.
 */
export async function resolveField<E, T>(
  surface: RenderingSurface<E>,
  scope: E,
  selectors: readonly string[],
  accept: (text: string) => T | null
): Promise<FieldMatch<T> | null> {
  for (const selector of selectors) {
    const [element] = await surface.querySelectorAll(selector, scope);
    if (element === undefined) continue;

    const value = accept(normalizeText(await surface.text(element)));
    if (value !== null) {
      return { value, selector };
    }
  }
  return null;
}

/**
 * First non-empty text along the chain
 */
export function resolveText<E>(
  surface: RenderingSurface<E>,
  scope: E,
  selectors: readonly string[]
): Promise<FieldMatch<string> | null> {
  return resolveField(surface, scope, selectors, (text) => (text ? text : null));
}
