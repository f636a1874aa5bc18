// ============================================================================
// RENDERING SURFACE
// ============================================================================
// DOM-automation primitives the harvester drives but does not implement

/**
 * One page session. `E` is the surface's element handle type.
 *
 * Queries return an empty list for "nothing matched"; a thrown error means
 * the surface itself failed (closed page, detached element, bad selector).
 */
export interface RenderingSurface<E = unknown> {
  navigate(url: string): Promise<void>;
  /** Query the document, or the subtree of `scope` when given */
  querySelectorAll(selector: string, scope?: E): Promise<E[]>;
  /** Number of document matches, counted in the page without handles */
  count(selector: string): Promise<number>;
  /** Rendered text of an element, untrimmed */
  text(element: E): Promise<string>;
  isVisible(element: E): Promise<boolean>;
  isEnabled(element: E): Promise<boolean>;
  scrollIntoView(element: E): Promise<void>;
  click(element: E): Promise<void>;
  /** Evaluate a script expression in the page and return its value */
  executeScript(code: string): Promise<unknown>;
  /** Dispatch one pointer-wheel tick */
  wheel(deltaY: number): Promise<void>;
  close(): Promise<void>;
}

/**
 * Hands out a fresh, isolated surface per item
 */
export interface SessionFactory<E = unknown> {
  create(): Promise<RenderingSurface<E>>;
}
