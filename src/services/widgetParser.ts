import { DEFAULT_REPORT_TIME_ZONE, DEFAULT_REPORT_ZONE_LABEL, TREND_GLYPHS } from '../constants/widgets.js';
import type { MetricSlots, NormalizedMetric, PeakFormatOptions, Trend, WidgetRecord } from '../types.js';
import { pick, pickString } from '../utils/data.js';
import { parseNumeric } from '../utils/normalize.js';
import { classifyTitle } from './classification.js';
import { extractPeak } from './peaks.js';

/** A lazily evaluated place a value may live in a widget. */
export type Candidate = (widget: WidgetRecord) => unknown;

export const CURRENT_VALUE_CANDIDATES: readonly Candidate[] = [
  (w) => pick(w, 'data', 'visualization', 'currentValue'),
  (w) => pick(w, 'rawConfiguration', 'nrqlQueries', 0, 'value'),
  (w) => pick(w, 'data', 'raw', 'current'),
  (w) => pick(w, 'data', 'raw', 'value'),
  (w) => resolveTitle(w),
];

export const COMPARISON_CANDIDATES: readonly Candidate[] = [
  (w) => pick(w, 'data', 'visualization', 'comparison'),
  (w) => pick(w, 'data', 'raw', 'comparison'),
  (w) => pick(w, 'rawConfiguration', 'thresholds', 0, 'value'),
];

const TREND_FIELD_CANDIDATES: readonly Candidate[] = [
  (w) => pick(w, 'data', 'visualization', 'trend'),
  (w) => pick(w, 'data', 'raw', 'trend'),
];

const TREND_TEXT_CANDIDATES: readonly Candidate[] = [
  (w) => pick(w, 'title'),
  (w) => pick(w, 'rawConfiguration', 'subtitle'),
];

const DEFAULT_PEAK_FORMAT: PeakFormatOptions = {
  timeZone: DEFAULT_REPORT_TIME_ZONE,
  zoneLabel: DEFAULT_REPORT_ZONE_LABEL,
};

/**
 * Evaluate candidates in order and return the first one the reader accepts.
 */
export function firstParsed<T>(
  widget: WidgetRecord,
  candidates: readonly Candidate[],
  read: (value: unknown) => T | undefined,
): T | undefined {
  for (const candidate of candidates) {
    const parsed = read(candidate(widget));
    if (parsed !== undefined) return parsed;
  }
  return undefined;
}

export function resolveTitle(widget: WidgetRecord): string | undefined {
  return pickString(widget, 'title') ?? pickString(widget, 'layout', 'title');
}

function readTrendField(value: unknown): Trend | undefined {
  if (typeof value !== 'string') return undefined;
  const normalized = value.trim().toLowerCase();
  return normalized === 'up' || normalized === 'down' || normalized === 'neutral' ? normalized : undefined;
}

function readTrendGlyph(value: unknown): Trend | undefined {
  if (typeof value !== 'string') return undefined;
  return TREND_GLYPHS.find(([glyph]) => value.includes(glyph))?.[1];
}

export function extractTrend(widget: WidgetRecord): Trend {
  return (
    firstParsed(widget, TREND_FIELD_CANDIDATES, readTrendField) ??
    firstParsed(widget, TREND_TEXT_CANDIDATES, readTrendGlyph) ??
    'neutral'
  );
}

/**
 * Normalize a single widget. Returns undefined when the widget has no title or
 * no numeric value can be recovered from any known location.
 */
export function parseWidget(
  widget: WidgetRecord,
  peakFormat: PeakFormatOptions = DEFAULT_PEAK_FORMAT,
): NormalizedMetric | undefined {
  const title = resolveTitle(widget);
  if (!title) return undefined;

  const currentValue = firstParsed(widget, CURRENT_VALUE_CANDIDATES, parseNumeric);
  if (currentValue === undefined) return undefined;

  const metric: NormalizedMetric = {
    title,
    currentValue,
    comparisonPct: firstParsed(widget, COMPARISON_CANDIDATES, parseNumeric) ?? 0,
    trend: extractTrend(widget),
    displayValue: pickString(widget, 'rawConfiguration', 'title') ?? String(currentValue),
  };

  const peak = extractPeak(widget, peakFormat);
  if (peak) {
    metric.peakValue = peak.value;
    metric.peakTime = peak.time;
  }
  return metric;
}

/**
 * Normalize a dashboard's widgets into the five metric slots.
 * Widgets that cannot be parsed or classified are dropped; the first widget
 * classified into a slot keeps it.
 */
export function parseWidgets(
  widgets: readonly WidgetRecord[],
  peakFormat: PeakFormatOptions = DEFAULT_PEAK_FORMAT,
): MetricSlots {
  const slots: MetricSlots = {};
  for (const widget of widgets) {
    const metric = parseWidget(widget, peakFormat);
    if (!metric) continue;
    const slot = classifyTitle(metric.title);
    if (slot && !slots[slot]) {
      slots[slot] = metric;
    }
  }
  return slots;
}
