import { describe, test, expect } from 'vitest';
import {
  ConfigError,
  DEFAULT_RETRY_CONFIG,
  HarvestErrorType,
  LoadStagnationError,
  NoContainersError,
  calculateRetryDelay,
  classifyError,
  isRetriable,
  wrapError,
} from '../types/errors.js';

describe('errors', () => {
  describe('classifyError', () => {
    test('classifies by error class first', () => {
      expect(classifyError(new LoadStagnationError('network stalled', 0, 5))).toBe(HarvestErrorType.LOAD);
      expect(classifyError(new ConfigError('bad value'))).toBe(HarvestErrorType.CONFIG);
      expect(classifyError(new NoContainersError())).toBe(HarvestErrorType.EXTRACTION);
    });

    test('classifies by message', () => {
      expect(classifyError(new Error('net::ERR_CONNECTION_REFUSED'))).toBe(HarvestErrorType.NETWORK);
      expect(classifyError(new Error('page.goto: Timeout 60000ms exceeded.'))).toBe(HarvestErrorType.TIMEOUT);
      expect(classifyError(new Error('Navigation failed because page crashed'))).toBe(HarvestErrorType.NAVIGATION);
      expect(classifyError(new Error('No containers found for any selector strategy'))).toBe(HarvestErrorType.EXTRACTION);
      expect(classifyError(new Error('Element is not attached to the DOM'))).toBe(HarvestErrorType.SELECTOR);
      expect(classifyError('something odd')).toBe(HarvestErrorType.UNKNOWN);
    });
  });

  describe('retry policy', () => {
    test('only transient errors are retriable by default', () => {
      expect(isRetriable(HarvestErrorType.NETWORK)).toBe(true);
      expect(isRetriable(HarvestErrorType.TIMEOUT)).toBe(true);
      expect(isRetriable(HarvestErrorType.NAVIGATION)).toBe(true);
      expect(isRetriable(HarvestErrorType.LOAD)).toBe(false);
      expect(isRetriable(HarvestErrorType.EXTRACTION)).toBe(false);
    });

    test('backs off exponentially up to the cap', () => {
      expect(calculateRetryDelay(0)).toBe(5000);
      expect(calculateRetryDelay(1)).toBe(10000);
      expect(calculateRetryDelay(2)).toBe(20000);
      expect(calculateRetryDelay(10)).toBe(DEFAULT_RETRY_CONFIG.maxDelay);
    });
  });

  describe('wrapError', () => {
    test('keeps the cause and context', () => {
      const cause = new Error('net::ERR_TIMED_OUT');
      const wrapped = wrapError(cause, { itemId: 'item-1' });

      expect(wrapped).toMatchObject({
        type: HarvestErrorType.NETWORK,
        message: 'net::ERR_TIMED_OUT',
        retriable: true,
        cause,
        itemId: 'item-1',
      });
    });

    test('uses the given retry config', () => {
      const wrapped = wrapError(new Error('net::ERR_FAILED'), {}, { ...DEFAULT_RETRY_CONFIG, retriableTypes: [] });
      expect(wrapped.retriable).toBe(false);
    });
  });
});
