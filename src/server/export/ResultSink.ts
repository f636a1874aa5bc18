// ============================================================================
// RESULT SINK
// ============================================================================

import path from 'path';
import type { ExportFormat, HarvestRunResult } from '../../shared/types.js';

export interface ResultSink {
  readonly format: ExportFormat;
  /** Persist the run and resolve to the written file path */
  write(result: HarvestRunResult, filePath: string): Promise<string>;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * YYYYMMDD_HHmmss in local time
 */
export function fileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function defaultOutputPath(outputDir: string, format: ExportFormat, date: Date = new Date()): string {
  return path.join(outputDir, `comments_${fileTimestamp(date)}.${format}`);
}
