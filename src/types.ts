/**
 * Shared types for TPS Pulse.
 */

/**
 * A single dashboard widget as returned by the monitoring source.
 * Nothing about its shape is guaranteed; every field is read defensively.
 */
export type WidgetRecord = Readonly<Record<string, unknown>>;

export type Trend = 'up' | 'down' | 'neutral';

export type MetricSlot = 'tsys_tps' | 'hpns_tps' | 'tsys_capacity' | 'hpns_capacity' | 'tps_ratio';

export interface NormalizedMetric {
  title: string;
  currentValue: number;
  comparisonPct: number; // signed percentage points vs. the prior week
  trend: Trend;
  displayValue: string;
  peakValue?: number;
  peakTime?: string; // formatted in the report time zone
}

export type MetricSlots = Partial<Record<MetricSlot, NormalizedMetric>>;

export type StatusLevel = 'good' | 'warning' | 'critical';

export interface Thresholds {
  warning: number;
  critical: number;
}

export interface AnalysisResult {
  trends: string[];
  trafficStatus: StatusLevel;
  capacityStatus: StatusLevel;
}

export interface PeakFormatOptions {
  timeZone: string; // IANA zone, e.g. America/New_York
  zoneLabel: string; // short label appended to rendered times, e.g. ET
}
