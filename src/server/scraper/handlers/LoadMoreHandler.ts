// ============================================================================
// LOAD MORE HANDLER
// ============================================================================

import type { RenderingSurface } from '../../surface/RenderingSurface.js';
import { LOAD_MORE_SELECTORS } from '../strategies.js';
import type { PacingConfig } from '../utils/pacing.js';
import { DEFAULT_PACING, Pacer } from '../utils/pacing.js';

export class LoadMoreHandler<E> {
  constructor(
    private surface: RenderingSurface<E>,
    private pacer: Pacer = new Pacer(),
    private pacing: PacingConfig = DEFAULT_PACING,
    private selectors: readonly string[] = LOAD_MORE_SELECTORS
  ) {}

  /**
   * Click the first visible, enabled "load more" control.
   * Resolves to the selector clicked, or null when none was found.
   */
  async tryLoadMore(): Promise<string | null> {
    for (const selector of this.selectors) {
      const buttons = await this.surface.querySelectorAll(selector);

      for (const button of buttons) {
        if (!(await this.surface.isVisible(button)) || !(await this.surface.isEnabled(button))) {
          continue;
        }

        await this.surface.scrollIntoView(button);
        await this.pacer.wait(this.pacing.beforeLoadMoreClick);
        await this.surface.click(button);
        await this.pacer.wait(this.pacing.afterLoadMoreClick);
        return selector;
      }
    }
    return null;
  }
}
