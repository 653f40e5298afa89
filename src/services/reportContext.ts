import type { ReportSettings } from '../config.js';
import type { ReportContext } from '../schemas/report.js';
import type { AnalysisResult, MetricSlots } from '../types.js';
import { formatReportClock } from '../utils/date.js';
import { formatMetric } from '../utils/normalize.js';
import { STATUS_SYMBOLS } from './trendTranslator.js';

export interface ReportContextOptions {
  eventName?: string; // overrides report.eventName
  now?: Date;
}

/**
 * Flatten metrics and analysis into the named string fields the report template reads.
 */
export function buildReportContext(
  metrics: MetricSlots,
  analysis: AnalysisResult,
  report: ReportSettings,
  opts: ReportContextOptions = {},
): ReportContext {
  const clock = formatReportClock(opts.now ?? new Date(), report);
  const { tsys_tps: tsys, hpns_tps: hpns, tsys_capacity: tsysCapacity, hpns_capacity: hpnsCapacity } = metrics;

  return {
    user_name: report.userName,
    timestamp: clock.timestamp,
    event_name: opts.eventName || report.eventName,
    report_date: clock.reportDate,
    report_time: clock.reportTime,
    dashboard_url: report.dashboardUrl,
    traffic_status: STATUS_SYMBOLS[analysis.trafficStatus],
    capacity_status: STATUS_SYMBOLS[analysis.capacityStatus],
    trends: analysis.trends.map((trend) => `• ${trend}`).join('\n'),
    tsys_avg_tps: formatMetric(tsys?.currentValue),
    tsys_peak_tps: formatMetric(tsys?.peakValue),
    tsys_peak_time: tsys?.peakTime ?? '--',
    tsys_avg_capacity: formatMetric(tsysCapacity?.currentValue),
    hpns_avg_tps: formatMetric(hpns?.currentValue),
    hpns_peak_tps: formatMetric(hpns?.peakValue),
    hpns_peak_time: hpns?.peakTime ?? '--',
    hpns_avg_capacity: formatMetric(hpnsCapacity?.currentValue),
  };
}
