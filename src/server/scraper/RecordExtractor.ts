// ============================================================================
// RECORD EXTRACTOR
// ============================================================================
// Converts comment containers into records using the resolved strategy plus
// per-field fallback chains

import type { HarvestRecord, Strategy } from '../../shared/types.js';
import type { RenderingSurface } from '../surface/RenderingSurface.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { NoContainersError, errorMessage } from './types/errors.js';
import {
  DEFAULT_STRATEGIES,
  UNAVAILABLE_CONTENT,
  UNKNOWN_IDENTITY,
  fieldChain,
} from './strategies.js';
import { resolveStrategy } from './StrategyResolver.js';
import { tryParseMetric } from './utils/MetricParser.js';
import { normalizeText, removeAll, resolveField, resolveText } from './utils/ValueExtractor.js';

export interface RecordExtractorOptions {
  strategies?: readonly Strategy[];
  logger?: Logger;
  now?: () => Date;
}

export interface ExtractionResult {
  records: HarvestRecord[];
  strategy: Strategy;
  containerCount: number;
  skipped: number;
}

export class RecordExtractor<E> {
  private strategies: readonly Strategy[];
  private logger: Logger;
  private now: () => Date;

  constructor(
    private surface: RenderingSurface<E>,
    options: RecordExtractorOptions = {}
  ) {
    this.strategies = options.strategies ?? DEFAULT_STRATEGIES;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Extract every record of the current page for `itemId`
   */
  async extractAll(itemId: string): Promise<HarvestRecord[]> {
    const result = await this.extract(itemId);
    return result.records;
  }

  /**
   * Same as extractAll, with resolution details.
   * Throws when no strategy matches any container.
   */
  async extract(itemId: string): Promise<ExtractionResult> {
    const resolved = await resolveStrategy(this.surface, this.strategies);
    if (!resolved) {
      throw new NoContainersError();
    }

    const { strategy, containers } = resolved;
    this.logger.info(`Strategy "${strategy.name}" matched ${containers.length} containers`);

    const records: HarvestRecord[] = [];
    let skipped = 0;

    for (let i = 0; i < containers.length; i++) {
      try {
        records.push(await this.extractRecord(containers[i], strategy, itemId, i + 1));
      } catch (error) {
        skipped++;
        this.logger.debug(`Skipped container ${i + 1}: ${errorMessage(error)}`);
      }
    }

    if (skipped > 0) {
      this.logger.info(`Extracted ${records.length} records, skipped ${skipped}`);
    }

    return { records, strategy, containerCount: containers.length, skipped };
  }

  /**
   * Build one record. Missing fields fall back to defaults; surface errors
   * propagate so the caller can skip the container.
   */
  async extractRecord(
    container: E,
    strategy: Strategy,
    itemId: string,
    sequence: number
  ): Promise<HarvestRecord> {
    const identity = await resolveText(this.surface, container, fieldChain(strategy, 'identity'));
    const identityText = identity?.value ?? UNKNOWN_IDENTITY;

    const content = await this.resolveContent(container, strategy, identity?.value ?? '');
    const metric = await resolveField(this.surface, container, fieldChain(strategy, 'metric'), tryParseMetric);

    return Object.freeze({
      sequence,
      itemId,
      identity: identityText,
      content,
      metric: metric?.value ?? 0,
      extractedAt: this.now().toISOString(),
    });
  }

  private async resolveContent(container: E, strategy: Strategy, identity: string): Promise<string> {
    const content = await resolveText(this.surface, container, fieldChain(strategy, 'content'));
    if (content) return content.value;

    // Whole container text minus the user name
    const fullText = removeAll(normalizeText(await this.surface.text(container)), identity);
    return fullText || UNAVAILABLE_CONTENT;
  }
}
