// ============================================================================
// HUMAN SCROLLER
// ============================================================================
// Randomized scroll interactions: smooth multi-step scroll, single jump,
// pointer-wheel ticks

import type { RenderingSurface } from '../../surface/RenderingSurface.js';
import type { PacingConfig } from '../utils/pacing.js';
import { DEFAULT_PACING, Pacer } from '../utils/pacing.js';

export type ScrollInteraction = 'smooth' | 'jump' | 'wheel';

export const SCROLL_INTERACTIONS: readonly ScrollInteraction[] = ['smooth', 'jump', 'wheel'];

export class HumanScroller<E> {
  constructor(
    private surface: RenderingSurface<E>,
    private pacer: Pacer = new Pacer(),
    private pacing: PacingConfig = DEFAULT_PACING
  ) {}

  /**
   * Perform one interaction chosen uniformly at random
   */
  async scrollOnce(): Promise<ScrollInteraction> {
    const interaction = this.pacer.pick(SCROLL_INTERACTIONS);
    switch (interaction) {
      case 'smooth':
        await this.smoothScroll();
        break;
      case 'jump':
        await this.jumpScroll();
        break;
      case 'wheel':
        await this.wheelScroll();
        break;
    }
    return interaction;
  }

  /**
   * 300-800px split into 5-15 sub-steps
   */
  async smoothScroll(): Promise<void> {
    const offset = await this.surface.executeScript('window.pageYOffset');
    const start = typeof offset === 'number' ? offset : 0;
    const distance = this.pacer.int(300, 800);
    const steps = this.pacer.int(5, 15);

    for (let step = 1; step <= steps; step++) {
      const position = Math.round(start + (distance * step) / steps);
      await this.surface.executeScript(`window.scrollTo(0, ${position})`);
      await this.pacer.wait(this.pacing.smoothStep);
    }
  }

  /**
   * One 400-1000px jump
   */
  async jumpScroll(): Promise<void> {
    const distance = this.pacer.int(400, 1000);
    await this.surface.executeScript(`window.scrollBy(0, ${distance})`);
  }

  /**
   * 3-8 wheel ticks of 100-300px
   */
  async wheelScroll(): Promise<void> {
    const ticks = this.pacer.int(3, 8);
    for (let tick = 0; tick < ticks; tick++) {
      await this.surface.wheel(this.pacer.int(100, 300));
      await this.pacer.wait(this.pacing.wheelTick);
    }
  }
}
