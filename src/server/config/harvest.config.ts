// ============================================================================
// HARVEST CONFIGURATION
// ============================================================================
// Environment-driven settings with defaults; `.env` is loaded by the CLI

import type { ExportFormat, StagnationPolicy } from '../../shared/types.js';
import { ConfigError } from '../scraper/types/errors.js';
import type { LogLevel } from '../utils/logger.js';
import { isLogLevel } from '../utils/logger.js';

export interface HarvestConfig {
  itemsFile: string;
  /** Records to load per item before stopping */
  target: number;
  maxIterations: number;
  stagnationThreshold: number;
  stagnationPolicy: StagnationPolicy;
  workers: number;
  maxRetries: number;
  headless: boolean;
  blockImages: boolean;
  outputDir: string;
  outputFormat: ExportFormat;
  logLevel: LogLevel;
}

export const DEFAULT_HARVEST_CONFIG: HarvestConfig = {
  itemsFile: 'video_urls.txt',
  target: 1000,
  maxIterations: 100,
  stagnationThreshold: 5,
  stagnationPolicy: 'partial-success',
  workers: 1,
  maxRetries: 0,
  headless: true,
  blockImages: true,
  outputDir: '.',
  outputFormat: 'xlsx',
  logLevel: 'info',
};

const STAGNATION_POLICIES: readonly StagnationPolicy[] = ['partial-success', 'always-success', 'failure'];
const EXPORT_FORMATS: readonly ExportFormat[] = ['xlsx', 'json'];

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new ConfigError(`${key} must be a boolean, got "${raw}"`);
}

function readChoice<T extends string>(env: Env, key: string, choices: readonly T[], fallback: T): T {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const choice = choices.find((c) => c === raw);
  if (choice === undefined) {
    throw new ConfigError(`${key} must be one of ${choices.join(', ')}, got "${raw}"`);
  }
  return choice;
}

/**
 * Build the harvest configuration from environment variables
 */
export function loadConfig(env: Env = process.env): HarvestConfig {
  const d = DEFAULT_HARVEST_CONFIG;
  const logLevel = env.LOG_LEVEL?.trim().toLowerCase();
  if (logLevel && !isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, silent, got "${logLevel}"`);
  }

  return {
    itemsFile: env.HARVEST_ITEMS_FILE?.trim() || d.itemsFile,
    target: readInt(env, 'HARVEST_TARGET', d.target, 1),
    maxIterations: readInt(env, 'HARVEST_MAX_ITERATIONS', d.maxIterations, 1),
    stagnationThreshold: readInt(env, 'HARVEST_STAGNATION_THRESHOLD', d.stagnationThreshold, 1),
    stagnationPolicy: readChoice(env, 'HARVEST_STAGNATION_POLICY', STAGNATION_POLICIES, d.stagnationPolicy),
    workers: readInt(env, 'HARVEST_WORKERS', d.workers, 1),
    maxRetries: readInt(env, 'HARVEST_MAX_RETRIES', d.maxRetries, 0),
    headless: readBool(env, 'HARVEST_HEADLESS', d.headless),
    blockImages: readBool(env, 'HARVEST_BLOCK_IMAGES', d.blockImages),
    outputDir: env.HARVEST_OUTPUT_DIR?.trim() || d.outputDir,
    outputFormat: readChoice(env, 'HARVEST_OUTPUT_FORMAT', EXPORT_FORMATS, d.outputFormat),
    logLevel: logLevel && isLogLevel(logLevel) ? logLevel : d.logLevel,
  };
}
