// ============================================================================
// JSON EXPORT
// ============================================================================

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { HarvestRunResult } from '../../shared/types.js';
import type { ResultSink } from './ResultSink.js';
import { computeStatistics } from './statistics.js';

export class JsonSink implements ResultSink {
  readonly format = 'json' as const;

  constructor(private pretty = true) {}

  async write(result: HarvestRunResult, filePath: string): Promise<string> {
    const payload = {
      records: result.records,
      failures: result.failures,
      statistics: computeStatistics(result.records, result.failures),
    };
    const json = this.pretty ? JSON.stringify(payload, null, 2) : JSON.stringify(payload);

    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, json, 'utf-8');
    return filePath;
  }
}
