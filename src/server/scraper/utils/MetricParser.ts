// ============================================================================
// METRIC PARSER UTILITY
// ============================================================================
// Normalizes abbreviated counters ("1200", "1.5k", "2M") to integers

const SUFFIX_MULTIPLIERS: Record<string, number> = {
  k: 1_000,
  m: 1_000_000,
};

// 1200 | 1,200
const PLAIN_COUNT = /^\d{1,3}(?:,\d{3})+$|^\d+$/;

// 1.5k | 2M | 12 K
const ABBREVIATED_COUNT = /^(\d+(?:\.\d+)?)\s*([km])$/i;

/**
 * Parse a counter into a non-negative integer, or null when the text is not
 * a counter
 */
export function tryParseMetric(text: string | null | undefined): number | null {
  if (!text) return null;
  const trimmed = text.trim();

  if (PLAIN_COUNT.test(trimmed)) {
    return parseInt(trimmed.replace(/,/g, ''), 10);
  }

  const match = trimmed.match(ABBREVIATED_COUNT);
  if (match) {
    const multiplier = SUFFIX_MULTIPLIERS[match[2].toLowerCase()];
    // toPrecision drops float noise such as 1.1 * 1000 = 1100.0000000000002
    return Math.trunc(Number((parseFloat(match[1]) * multiplier).toPrecision(12)));
  }

  return null;
}

/**
 * Parse a counter; anything unparsable becomes 0
 */
export function parseMetric(text: string | null | undefined): number {
  return tryParseMetric(text) ?? 0;
}
