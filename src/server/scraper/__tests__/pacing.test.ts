import { describe, test, expect, vi } from 'vitest';
import { Pacer, pick, randomInt } from '../utils/pacing.js';

describe('pacing', () => {
  test('randomInt covers the inclusive range', () => {
    expect(randomInt(3, 8, () => 0)).toBe(3);
    expect(randomInt(3, 8, () => 0.999999)).toBe(8);
    expect(randomInt(5, 5, () => 0.5)).toBe(5);
  });

  test('pick selects by the random source', () => {
    expect(pick(['a', 'b', 'c'], () => 0.5)).toBe('b');
    expect(() => pick([], () => 0)).toThrow('Cannot pick from an empty list');
  });

  test('Pacer sleeps for the drawn delay', async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const pacer = new Pacer(sleep, () => 0.5);

    expect(await pacer.wait([1000, 2000])).toBe(1500);
    expect(sleep).toHaveBeenCalledWith(1500);
  });
});
