import { describe, test, expect } from 'vitest';
import { DEFAULT_HARVEST_CONFIG, loadConfig } from '../harvest.config.js';
import { ConfigError } from '../../scraper/types/errors.js';

describe('loadConfig', () => {
  test('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_HARVEST_CONFIG);
  });

  test('reads overrides', () => {
    const config = loadConfig({
      HARVEST_ITEMS_FILE: 'lists/today.txt',
      HARVEST_TARGET: '250',
      HARVEST_STAGNATION_POLICY: 'failure',
      HARVEST_WORKERS: '3',
      HARVEST_MAX_RETRIES: '2',
      HARVEST_HEADLESS: 'false',
      HARVEST_BLOCK_IMAGES: '0',
      HARVEST_OUTPUT_FORMAT: 'json',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config).toMatchObject({
      itemsFile: 'lists/today.txt',
      target: 250,
      stagnationPolicy: 'failure',
      workers: 3,
      maxRetries: 2,
      headless: false,
      blockImages: false,
      outputFormat: 'json',
      logLevel: 'debug',
    });
  });

  test('treats blank values as unset', () => {
    expect(loadConfig({ HARVEST_TARGET: '  ', HARVEST_OUTPUT_DIR: '' }).target).toBe(1000);
  });

  test('rejects invalid numbers', () => {
    expect(() => loadConfig({ HARVEST_WORKERS: '0' })).toThrow(ConfigError);
    expect(() => loadConfig({ HARVEST_TARGET: '1.5' })).toThrow('HARVEST_TARGET must be an integer >= 1, got "1.5"');
  });

  test('rejects unknown choices', () => {
    expect(() => loadConfig({ HARVEST_STAGNATION_POLICY: 'sometimes' })).toThrow(
      'HARVEST_STAGNATION_POLICY must be one of partial-success, always-success, failure, got "sometimes"'
    );
    expect(() => loadConfig({ HARVEST_HEADLESS: 'maybe' })).toThrow(ConfigError);
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
  });
});
