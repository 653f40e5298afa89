import type { Trend } from '../types.js';

/**
 * Directional glyphs that dashboards embed in titles and subtitles.
 * Scanned in this order; the first glyph present decides the trend.
 */
export const TREND_GLYPHS: ReadonlyArray<readonly [glyph: string, trend: Exclude<Trend, 'neutral'>]> = [
  ['↗', 'up'],
  ['▲', 'up'],
  ['↑', 'up'],
  ['↘', 'down'],
  ['▼', 'down'],
  ['↓', 'down'],
];

/** Keys that may carry the numeric value of a time-series point, in preference order. */
export const POINT_VALUE_KEYS = ['tps', 'y', 'value', 'rate', 'count'] as const;

/** Keys that may carry the timestamp of a time-series point, in preference order. */
export const POINT_TIME_KEYS = ['endTimeSeconds', 'beginTimeSeconds', 'x', 'timestamp', 'endTime', 'time'] as const;

// Widget payloads are a handful of levels deep; anything past this is ignored.
export const MAX_TRAVERSAL_DEPTH = 32;

export const DEFAULT_REPORT_TIME_ZONE = 'America/New_York';
export const DEFAULT_REPORT_ZONE_LABEL = 'ET';
