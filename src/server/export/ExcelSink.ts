// ============================================================================
// EXCEL EXPORT
// ============================================================================

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import XLSX from 'xlsx-js-style';
import type { WorkBook, WorkSheet } from 'xlsx-js-style';
import type { HarvestRunResult } from '../../shared/types.js';
import type { ResultSink } from './ResultSink.js';
import { computeStatistics, describeTopRecord } from './statistics.js';

type Cell = string | number;

const HEADER_STYLE = {
  font: { bold: true, color: { rgb: 'FFFFFF' } },
  fill: { fgColor: { rgb: '4472C4' } },
  alignment: { horizontal: 'center' },
};

export const SHEET_NAMES = {
  records: 'Records',
  statistics: 'Statistics',
  failures: 'Failed Items',
} as const;

function buildSheet(header: string[], rows: Cell[][]): WorkSheet {
  const ws = XLSX.utils.aoa_to_sheet([header, ...rows]);

  header.forEach((_, col) => {
    const cell = ws[XLSX.utils.encode_cell({ r: 0, c: col })];
    if (cell) cell.s = HEADER_STYLE;
  });

  // Set column widths based on content
  ws['!cols'] = header.map((title, col) => {
    const widest = rows.reduce((max, row) => Math.max(max, String(row[col] ?? '').length), title.length);
    return { wch: Math.min(widest + 2, 50) }; // Cap at 50 chars
  });

  return ws;
}

/**
 * Workbook with records, statistics and failed items sheets
 */
export function buildWorkbook(result: HarvestRunResult): WorkBook {
  const stats = computeStatistics(result.records, result.failures);
  const wb = XLSX.utils.book_new();

  const recordRows = result.records.map((r) => [
    r.sequence,
    r.itemId,
    r.identity,
    r.content,
    r.metric,
    r.extractedAt,
  ]);
  XLSX.utils.book_append_sheet(
    wb,
    buildSheet(['#', 'Source', 'User', 'Content', 'Likes', 'Extracted At'], recordRows),
    SHEET_NAMES.records
  );

  const statRows: Cell[][] = [
    ['Total records', stats.totalRecords],
    ['Unique users', stats.uniqueIdentities],
    ['Items with records', stats.uniqueItems],
    ['Total likes', stats.metricSum],
    ['Average records per item', stats.averagePerItem],
    ['Most liked', describeTopRecord(stats.topRecord)],
    ['First extracted', stats.firstExtractedAt ?? '-'],
    ['Last extracted', stats.lastExtractedAt ?? '-'],
    ['Failed items', stats.failedItems],
  ];
  XLSX.utils.book_append_sheet(wb, buildSheet(['Metric', 'Value'], statRows), SHEET_NAMES.statistics);

  const failureRows = result.failures.map((f) => [f.itemId, f.stage, f.errorType, f.message, f.attempts]);
  XLSX.utils.book_append_sheet(
    wb,
    buildSheet(['Source', 'Stage', 'Error type', 'Message', 'Attempts'], failureRows),
    SHEET_NAMES.failures
  );

  return wb;
}

export class ExcelSink implements ResultSink {
  readonly format = 'xlsx' as const;

  async write(result: HarvestRunResult, filePath: string): Promise<string> {
    const buffer: Buffer = XLSX.write(buildWorkbook(result), { type: 'buffer', bookType: 'xlsx' });
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, buffer);
    return filePath;
  }
}
