// ============================================================================
// HARVEST RUN - wires config, sessions, orchestrator and sink together
// ============================================================================

import type { ExportFormat, HarvestRunResult } from '../shared/types.js';
import type { HarvestConfig } from './config/harvest.config.js';
import { ExcelSink } from './export/ExcelSink.js';
import { JsonSink } from './export/JsonSink.js';
import type { ResultSink } from './export/ResultSink.js';
import { defaultOutputPath } from './export/ResultSink.js';
import { computeStatistics } from './export/statistics.js';
import { BatchOrchestrator } from './scraper/BatchOrchestrator.js';
import type { OrchestratorDependencies } from './scraper/BatchOrchestrator.js';
import type { Logger } from './utils/logger.js';

export function createSink(format: ExportFormat): ResultSink {
  return format === 'json' ? new JsonSink() : new ExcelSink();
}

export function createOrchestrator<E>(
  config: HarvestConfig,
  deps: OrchestratorDependencies<E>
): BatchOrchestrator<E> {
  return new BatchOrchestrator(deps, {
    workers: config.workers,
    load: {
      maxIterations: config.maxIterations,
      stagnationThreshold: config.stagnationThreshold,
      stagnationPolicy: config.stagnationPolicy,
    },
    retry: { maxRetries: config.maxRetries },
  });
}

/**
 * Write the run to the configured sink and log its statistics
 */
export async function flushResults(
  result: HarvestRunResult,
  config: HarvestConfig,
  logger: Logger,
  sink: ResultSink = createSink(config.outputFormat)
): Promise<string> {
  const filePath = await sink.write(result, defaultOutputPath(config.outputDir, sink.format));
  const stats = computeStatistics(result.records, result.failures);

  logger.info(`Saved ${stats.totalRecords} records to ${filePath}`);
  logger.info(
    `Users: ${stats.uniqueIdentities}, items: ${stats.uniqueItems}, likes: ${stats.metricSum}, failed items: ${stats.failedItems}`
  );
  return filePath;
}

/**
 * Writes a run at most once. A second request, such as an interrupt arriving
 * while the final write is in progress, waits on the first write.
 */
export class ResultFlusher {
  private pending: Promise<string> | null = null;

  constructor(
    private config: HarvestConfig,
    private logger: Logger,
    private sink: ResultSink = createSink(config.outputFormat)
  ) {}

  get started(): boolean {
    return this.pending !== null;
  }

  flush(result: HarvestRunResult): Promise<string> {
    if (!this.pending) {
      this.pending = flushResults(result, this.config, this.logger, this.sink);
    }
    return this.pending;
  }
}
