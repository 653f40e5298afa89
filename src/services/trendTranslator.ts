import { toFixed1 } from '../utils/normalize.js';
import type { AnalysisResult, MetricSlots, NormalizedMetric, StatusLevel, Thresholds } from '../types.js';

export const STATUS_SYMBOLS: Record<StatusLevel, string> = {
  good: '🟢',
  warning: '🟡',
  critical: '🔴',
};

// Traffic status cut-offs in TPS, per subsystem.
const TSYS_TPS_LEVELS = { good: 2000, warning: 1000 };
const HPNS_TPS_LEVELS = { good: 800, warning: 400 };

function pct(value: number): string {
  return toFixed1(Math.abs(value));
}

function directionWord(comparison: number): 'higher' | 'lower' {
  return comparison < 0 ? 'lower' : 'higher';
}

function trendPhrase(serviceName: string, metric: NormalizedMetric): string {
  if (metric.trend === 'up') {
    return `The TPS is ${pct(metric.comparisonPct)}% higher than last week for ${serviceName}`;
  }
  if (metric.trend === 'down') {
    return `The TPS is ${pct(metric.comparisonPct)}% lower than last week for ${serviceName}`;
  }
  return `The TPS is stable for ${serviceName}`;
}

export function describeTraffic(tsys: NormalizedMetric, hpns: NormalizedMetric): string {
  return `${trendPhrase('TSYS Mainframe', tsys)}; ${trendPhrase('HPNS', hpns)}.`;
}

export function describeRatio(ratio: NormalizedMetric): string {
  return (
    `Requests that require data from HPNS have been approx. ${toFixed1(ratio.currentValue)}% of total, ` +
    `which is ${pct(ratio.comparisonPct)}% ${directionWord(ratio.comparisonPct)} than last week.`
  );
}

export function describeCapacity(
  tsysCapacity: NormalizedMetric,
  hpnsCapacity: NormalizedMetric,
  thresholds: Thresholds,
): string {
  const tsys = tsysCapacity.currentValue;
  const hpns = hpnsCapacity.currentValue;
  const max = Math.max(tsys, hpns);

  if (max >= thresholds.critical) {
    const service = tsys >= hpns ? 'TSYS' : 'HPNS';
    return `⚠️ Capacity utilization is elevated at ${toFixed1(max)}% for ${service}. Recommend monitoring closely.`;
  }
  if (max >= thresholds.warning) {
    return (
      'Capacity utilization is elevated but manageable ' +
      `(TSYS: ${toFixed1(tsys)}%, HPNS: ${toFixed1(hpns)}%). Monitoring trends.`
    );
  }
  return "Growth is closely matching last week's behavior. There are no capacity concerns at this time.";
}

export function trafficStatus(tsys?: NormalizedMetric, hpns?: NormalizedMetric): StatusLevel {
  const tsysValue = tsys?.currentValue ?? 0;
  const hpnsValue = hpns?.currentValue ?? 0;
  if (tsysValue > TSYS_TPS_LEVELS.good && hpnsValue > HPNS_TPS_LEVELS.good) return 'good';
  if (tsysValue > TSYS_TPS_LEVELS.warning || hpnsValue > HPNS_TPS_LEVELS.warning) return 'warning';
  return 'critical';
}

export function capacityStatus(
  tsysCapacity: NormalizedMetric | undefined,
  hpnsCapacity: NormalizedMetric | undefined,
  thresholds: Thresholds,
): StatusLevel {
  const max = Math.max(tsysCapacity?.currentValue ?? 0, hpnsCapacity?.currentValue ?? 0);
  if (max >= thresholds.critical) return 'critical';
  if (max >= thresholds.warning) return 'warning';
  return 'good';
}

/**
 * Turn normalized metrics into narrative sentences and status levels.
 * Sentences whose inputs are missing are left out; statuses read missing metrics as 0.
 */
export function translateTrends(metrics: MetricSlots, thresholds: Thresholds): AnalysisResult {
  const { tsys_tps: tsys, hpns_tps: hpns, tps_ratio: ratio, tsys_capacity: tsysCapacity, hpns_capacity: hpnsCapacity } =
    metrics;

  const trends: string[] = [];
  if (tsys && hpns) trends.push(describeTraffic(tsys, hpns));
  if (ratio) trends.push(describeRatio(ratio));
  if (tsysCapacity && hpnsCapacity) trends.push(describeCapacity(tsysCapacity, hpnsCapacity, thresholds));

  return {
    trends,
    trafficStatus: trafficStatus(tsys, hpns),
    capacityStatus: capacityStatus(tsysCapacity, hpnsCapacity, thresholds),
  };
}
