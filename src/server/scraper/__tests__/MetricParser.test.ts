import { describe, test, expect } from 'vitest';
import { parseMetric, tryParseMetric } from '../utils/MetricParser.js';

describe('MetricParser', () => {
  describe('parseMetric', () => {
    test('parses plain digit counts', () => {
      expect(parseMetric('1200')).toBe(1200);
      expect(parseMetric('0')).toBe(0);
      expect(parseMetric('  42 ')).toBe(42);
    });

    test('parses thousands separators', () => {
      expect(parseMetric('1,234')).toBe(1234);
      expect(parseMetric('12,345,678')).toBe(12345678);
    });

    test('expands k suffix and truncates', () => {
      expect(parseMetric('1.5k')).toBe(1500);
      expect(parseMetric('3K')).toBe(3000);
      expect(parseMetric('1.2345k')).toBe(1234);
      expect(parseMetric('1.1k')).toBe(1100);
    });

    test('expands m suffix', () => {
      expect(parseMetric('2M')).toBe(2000000);
      expect(parseMetric('1.25m')).toBe(1250000);
      expect(parseMetric('4.7 M')).toBe(4700000);
    });

    test('returns 0 for unparsable text', () => {
      expect(parseMetric('--')).toBe(0);
      expect(parseMetric('')).toBe(0);
      expect(parseMetric(null)).toBe(0);
      expect(parseMetric(undefined)).toBe(0);
      expect(parseMetric('Reply')).toBe(0);
      expect(parseMetric('1.5b')).toBe(0);
      expect(parseMetric('-5')).toBe(0);
      expect(parseMetric('1,23')).toBe(0);
    });
  });

  describe('tryParseMetric', () => {
    test('distinguishes zero from unparsable', () => {
      expect(tryParseMetric('0')).toBe(0);
      expect(tryParseMetric('likes')).toBeNull();
      expect(tryParseMetric('   ')).toBeNull();
    });
  });
});
