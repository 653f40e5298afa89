import { TZDate, tz } from '@date-fns/tz';
import { format, parseISO } from 'date-fns';
import type { PeakFormatOptions } from '../types.js';

// Epoch values above this are milliseconds.
const MILLISECONDS_THRESHOLD = 1e12;

function fromEpochNumber(t: number): number | undefined {
  if (!Number.isFinite(t)) return undefined;
  return Math.trunc(t > MILLISECONDS_THRESHOLD ? t / 1000 : t);
}

/**
 * Parse an ISO-8601 date or date-time, extended or basic format. Values
 * without an offset are read as UTC; impossible calendar dates are rejected.
 */
export function parseIsoSeconds(input: string): number | undefined {
  const ms = parseISO(input, { in: tz('UTC') }).getTime();
  return Number.isNaN(ms) ? undefined : Math.trunc(ms / 1000);
}

/**
 * Coerce a timestamp-like value to whole epoch seconds.
 * Supports epoch seconds, epoch milliseconds, ISO-8601 strings and numeric strings.
 */
export function toEpochSeconds(ts: unknown): number | undefined {
  if (typeof ts === 'number') return fromEpochNumber(ts);
  if (typeof ts !== 'string') return undefined;

  const s = ts.trim();
  if (!s) return undefined;
  const iso = parseIsoSeconds(s);
  if (iso !== undefined) return iso;
  return fromEpochNumber(Number(s));
}

function quoteLiteral(text: string): string {
  return `'${text.replace(/'/g, "''")}'`;
}

/**
 * Format epoch seconds in the given IANA zone with a date-fns pattern.
 * Throws RangeError for unknown zones.
 */
export function formatInZone(epochSeconds: number, pattern: string, timeZone: string): string {
  return format(new TZDate(epochSeconds * 1000, timeZone), pattern);
}

/**
 * "10:45 AM ET on Jan 05, 2024"
 */
export function formatPeakTime(epochSeconds: number, opts: PeakFormatOptions): string {
  return formatInZone(epochSeconds, `h:mm a ${quoteLiteral(`${opts.zoneLabel} on`)} MMM dd, yyyy`, opts.timeZone);
}

export interface ReportClock {
  reportDate: string; // January 05, 2024
  reportTime: string; // 10:45 AM ET
  timestamp: string; // Jan 05 at 10:45 AM ET
}

export function formatReportClock(now: Date, opts: PeakFormatOptions): ReportClock {
  const seconds = Math.trunc(now.getTime() / 1000);
  const label = quoteLiteral(opts.zoneLabel);
  return {
    reportDate: formatInZone(seconds, 'MMMM dd, yyyy', opts.timeZone),
    reportTime: formatInZone(seconds, `h:mm a ${label}`, opts.timeZone),
    timestamp: formatInZone(seconds, `MMM dd 'at' h:mm a ${label}`, opts.timeZone),
  };
}
