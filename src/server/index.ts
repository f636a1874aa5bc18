#!/usr/bin/env node
// ============================================================================
// CLI ENTRY - harvest comments for every item in a list file
// ============================================================================
// Usage: comment-harvester [items-file]

import dotenv from 'dotenv';
import type { ElementHandle } from 'playwright';
import { BrowserManager } from './browser/BrowserManager.js';
import type { HarvestConfig } from './config/harvest.config.js';
import { loadConfig } from './config/harvest.config.js';
import { ResultFlusher, createOrchestrator } from './harvest.js';
import { loadItems } from './input/itemsFile.js';
import type { BatchOrchestrator } from './scraper/BatchOrchestrator.js';
import { errorMessage } from './scraper/types/errors.js';
import type { Logger } from './utils/logger.js';
import { createLogger } from './utils/logger.js';

// Load environment variables
dotenv.config();

async function main(): Promise<number> {
  let config: HarvestConfig;
  try {
    config = loadConfig(process.env);
  } catch (error) {
    console.error(`[Harvester] ${errorMessage(error)}`);
    return 1;
  }

  const logger = createLogger('Harvester', config.logLevel);
  const itemsFile = process.argv[2] ?? config.itemsFile;

  let items: string[];
  try {
    items = await loadItems(itemsFile);
  } catch (error) {
    logger.error(`Cannot read item list ${itemsFile}: ${errorMessage(error)}`);
    return 1;
  }

  if (items.length === 0) {
    logger.warn(`No items in ${itemsFile}`);
    return 0;
  }

  const browserManager = new BrowserManager(
    { headless: config.headless, blockImages: config.blockImages },
    logger.child('BrowserManager')
  );
  const orchestrator = createOrchestrator(config, {
    sessions: browserManager,
    logger: logger.child('BatchOrchestrator'),
  });

  const flusher = new ResultFlusher(config, logger);
  installInterruptHandlers(orchestrator, browserManager, flusher, logger);

  const result = await orchestrator.run(items, config.target);
  await flusher.flush(result);
  return 0;
}

/**
 * On SIGINT/SIGTERM, save what has been collected so far and exit.
 * An interrupt during the final save waits for it instead of writing again.
 */
function installInterruptHandlers(
  orchestrator: BatchOrchestrator<ElementHandle>,
  browserManager: BrowserManager,
  flusher: ResultFlusher,
  logger: Logger
): void {
  let interrupted = false;

  const onSignal = async (signal: NodeJS.Signals): Promise<void> => {
    if (interrupted) return;
    interrupted = true;
    logger.warn(
      flusher.started ? `${signal} received, waiting for results to be saved...` : `${signal} received, saving partial results...`
    );

    try {
      await flusher.flush(orchestrator.snapshot());
    } catch (error) {
      logger.error(`Could not save partial results: ${errorMessage(error)}`);
    }
    await browserManager.shutdown();
    process.exit(130);
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('[Harvester] Fatal error:', error);
    process.exitCode = 1;
  }
);
