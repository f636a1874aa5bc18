// ============================================================================
// ITEM LIST LOADER
// ============================================================================

import { readFile } from 'fs/promises';

/**
 * Item ids from newline-delimited text: lines are trimmed, blank lines and
 * `#` comments dropped
 */
export function parseItems(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

export async function loadItems(filePath: string): Promise<string[]> {
  const text = await readFile(filePath, 'utf-8');
  return parseItems(text);
}
