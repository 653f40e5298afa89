/**
 * Generic normalization and string helpers.
 * These utilities are used across widget parsing, classification, and report shaping.
 */

const FIRST_NUMBER = /-?\d+(?:\.\d+)?/;

/**
 * Parse a dashboard value into a number.
 * Accepts finite numbers as-is. Strings may carry a trailing % (dropped), a
 * k/K (x1,000) or m/M (x1,000,000) magnitude suffix, and surrounding text; the
 * first signed decimal found is used.
 * Examples: "1.5k" => 1500, "42%" => 42, "Peak: -3.2 pts" => -3.2
 */
export function parseNumeric(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== 'string') return undefined;

  let cleaned = value.trim();
  let multiplier = 1;
  if (cleaned.endsWith('%')) {
    cleaned = cleaned.slice(0, -1);
  }
  if (cleaned.toLowerCase().endsWith('k')) {
    multiplier = 1_000;
    cleaned = cleaned.slice(0, -1);
  }
  if (cleaned.toLowerCase().endsWith('m')) {
    multiplier = 1_000_000;
    cleaned = cleaned.slice(0, -1);
  }

  const match = FIRST_NUMBER.exec(cleaned);
  if (!match) return undefined;
  const parsed = Number(match[0]) * multiplier;
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * One-decimal rendering that rounds exact halves to even: 72.25 => "72.2",
 * 72.75 => "72.8". Only x.x5 values that are exact in binary (a multiple of
 * 0.25) can tie; everything else goes through toFixed.
 */
export function toFixed1(value: number): string {
  const quarters = value * 4;
  if (Number.isInteger(quarters) && quarters % 2 !== 0) {
    const lower = Math.floor(value * 10);
    const tenths = lower % 2 === 0 ? lower : lower + 1;
    return (tenths / 10).toFixed(1);
  }
  return value.toFixed(1);
}

/**
 * Normalize a widget title for keyword matching: lowercase + trim.
 */
export function normalizeTitle(text: string): string {
  return (text || '').toLowerCase().trim();
}

/**
 * Render a metric for the report: "--" when absent, thousands as "2.5k", otherwise one decimal.
 */
export function formatMetric(value: number | undefined): string {
  if (value === undefined) return '--';
  if (value >= 1000) return `${toFixed1(value / 1000)}k`;
  return toFixed1(value);
}
