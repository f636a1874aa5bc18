import { describe, test, expect, vi } from 'vitest';
import { HumanScroller } from '../handlers/HumanScroller.js';
import { LoadMoreHandler } from '../handlers/LoadMoreHandler.js';
import { DEFAULT_PACING, Pacer } from '../utils/pacing.js';
import { DomSurface, instantSleep, sequenceRandom } from './helpers/DomSurface.js';

describe('HumanScroller', () => {
  test('smooth scroll walks 300-800px in sub-steps with pauses', async () => {
    const surface = new DomSurface('<p>page</p>');
    const sleep = vi.fn(instantSleep);
    const scroller = new HumanScroller(surface, new Pacer(sleep, () => 0));

    expect(await scroller.scrollOnce()).toBe('smooth');
    expect(surface.scripts).toEqual([
      'window.pageYOffset',
      'window.scrollTo(0, 60)',
      'window.scrollTo(0, 120)',
      'window.scrollTo(0, 180)',
      'window.scrollTo(0, 240)',
      'window.scrollTo(0, 300)',
    ]);
    expect(sleep.mock.calls).toEqual([[50], [50], [50], [50], [50]]);
  });

  test('jump scroll moves once', async () => {
    const surface = new DomSurface('<p>page</p>');
    const scroller = new HumanScroller(surface, new Pacer(instantSleep, sequenceRandom([0.5, 0])));

    expect(await scroller.scrollOnce()).toBe('jump');
    expect(surface.scripts).toEqual(['window.scrollBy(0, 400)']);
  });

  test('wheel scroll sends 3-8 ticks with pauses', async () => {
    const surface = new DomSurface('<p>page</p>');
    const sleep = vi.fn(instantSleep);
    const scroller = new HumanScroller(surface, new Pacer(sleep, sequenceRandom([0.9, 0, 0.5, 0, 0.999, 0])));

    expect(await scroller.scrollOnce()).toBe('wheel');
    expect(surface.wheelTicks).toEqual([200, 300, 280]);
    expect(sleep.mock.calls).toEqual([[100], [100], [100]]);
  });
});

describe('LoadMoreHandler', () => {
  test('clicks the first visible, enabled control', async () => {
    const surface = new DomSurface(`
      <button class="load-more" disabled>More</button>
      <div class="load-more-wrapper" hidden>More</div>
      <button data-testid="load-more">More</button>
    `);
    const sleep = vi.fn(instantSleep);
    const handler = new LoadMoreHandler(surface, new Pacer(sleep, () => 0));

    expect(await handler.tryLoadMore()).toBe('[data-testid="load-more"]');
    expect(surface.clicked.map((el) => el.getAttribute('data-testid'))).toEqual(['load-more']);
    expect(sleep.mock.calls).toEqual([[DEFAULT_PACING.beforeLoadMoreClick[0]], [DEFAULT_PACING.afterLoadMoreClick[0]]]);
  });

  test('returns null without clicking when nothing qualifies', async () => {
    const surface = new DomSurface('<button class="load-more" disabled>More</button>');
    const handler = new LoadMoreHandler(surface, new Pacer(instantSleep, () => 0));

    expect(await handler.tryLoadMore()).toBeNull();
    expect(surface.clicked).toHaveLength(0);
  });
});
