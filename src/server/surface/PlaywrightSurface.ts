// ============================================================================
// PLAYWRIGHT SURFACE
// ============================================================================

import type { ElementHandle, Page } from 'playwright';
import type { RenderingSurface } from './RenderingSurface.js';

const NAVIGATION_TIMEOUT = 60000;

/**
 * Rendering surface over a Playwright page. `onClose` releases the
 * browser resources that own the page.
 */
export class PlaywrightSurface implements RenderingSurface<ElementHandle> {
  private closed = false;

  constructor(
    private page: Page,
    private onClose: () => Promise<void>
  ) {}

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: NAVIGATION_TIMEOUT });
  }

  async querySelectorAll(selector: string, scope?: ElementHandle): Promise<ElementHandle[]> {
    const handles = scope ? await scope.$$(selector) : await this.page.$$(selector);
    return handles;
  }

  async count(selector: string): Promise<number> {
    return this.page.locator(selector).count();
  }

  async text(element: ElementHandle): Promise<string> {
    return element.innerText();
  }

  async isVisible(element: ElementHandle): Promise<boolean> {
    return element.isVisible();
  }

  async isEnabled(element: ElementHandle): Promise<boolean> {
    return element.isEnabled();
  }

  async scrollIntoView(element: ElementHandle): Promise<void> {
    await element.scrollIntoViewIfNeeded();
  }

  async click(element: ElementHandle): Promise<void> {
    await element.click();
  }

  async executeScript(code: string): Promise<unknown> {
    const value: unknown = await this.page.evaluate(code);
    return value;
  }

  async wheel(deltaY: number): Promise<void> {
    await this.page.mouse.wheel(0, deltaY);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.onClose();
  }
}
