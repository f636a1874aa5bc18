import { describe, test, expect } from 'vitest';
import { HARVEST_BROWSER_FLAGS, USER_AGENTS } from '../browser-flags.js';

describe('browser-flags', () => {
  test('denies permission prompts', () => {
    expect(HARVEST_BROWSER_FLAGS).toContain('--deny-permission-prompts');
  });

  test('only offers Chrome user agents', () => {
    expect(USER_AGENTS).toHaveLength(4);
    for (const userAgent of USER_AGENTS) {
      expect(userAgent).toMatch(/ Chrome\/\d+\.0\.0\.0 Safari\/537\.36$/);
      expect(userAgent).not.toContain('Firefox');
    }
  });
});
