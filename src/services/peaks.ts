import { MAX_TRAVERSAL_DEPTH, POINT_TIME_KEYS, POINT_VALUE_KEYS } from '../constants/widgets.js';
import type { PeakFormatOptions } from '../types.js';
import { pick, visitData } from '../utils/data.js';
import { formatPeakTime, toEpochSeconds } from '../utils/date.js';
import { parseNumeric } from '../utils/normalize.js';
import { logger } from '../logger.js';

export interface SeriesPoint {
  value: number;
  epochSeconds: number;
}

export interface Peak {
  value: number;
  time: string;
}

/**
 * Read a mapping as a time-series point: the first parseable value key plus the
 * first present time key. A present but unparseable timestamp rejects the point.
 */
export function readPoint(entries: Readonly<Record<string, unknown>>): SeriesPoint | undefined {
  let value: number | undefined;
  for (const key of POINT_VALUE_KEYS) {
    value = parseNumeric(entries[key]);
    if (value !== undefined) break;
  }
  if (value === undefined) return undefined;

  const rawTime = POINT_TIME_KEYS.map((key) => entries[key]).find((candidate) => candidate != null);
  const epochSeconds = toEpochSeconds(rawTime);
  if (epochSeconds === undefined) return undefined;

  return { value, epochSeconds };
}

/**
 * Collect every point-like mapping found anywhere under root.
 */
export function gatherPoints(root: unknown): SeriesPoint[] {
  const points: SeriesPoint[] = [];
  visitData(
    root,
    {
      mapping(entries) {
        const point = readPoint(entries);
        if (point) points.push(point);
      },
    },
    MAX_TRAVERSAL_DEPTH,
  );
  return points;
}

/**
 * Pick the highest point. Ties keep the earliest point encountered.
 */
export function selectPeak(points: readonly SeriesPoint[]): SeriesPoint | undefined {
  let peak: SeriesPoint | undefined;
  for (const point of points) {
    if (!peak || point.value > peak.value) peak = point;
  }
  return peak;
}

/**
 * Derive the peak value and its local time from the raw and visualization data of a widget.
 */
export function extractPeak(widget: unknown, opts: PeakFormatOptions): Peak | undefined {
  const points = [...gatherPoints(pick(widget, 'data', 'raw')), ...gatherPoints(pick(widget, 'data', 'visualization'))];
  const peak = selectPeak(points);
  if (!peak) return undefined;

  let time: string;
  try {
    time = formatPeakTime(peak.epochSeconds, opts);
  } catch (err) {
    logger.debug({ err, timeZone: opts.timeZone }, 'Could not format peak time; using epoch seconds');
    time = String(peak.epochSeconds);
  }
  return { value: peak.value, time };
}
