import type { MetricSlots, PeakFormatOptions } from '../types.js';
import { logger } from '../logger.js';
import type { DashboardSource } from './newrelic.js';
import { parseWidgets } from './widgetParser.js';

/**
 * Facade that returns normalized dashboard metrics.
 */
export class DashboardService {
  constructor(
    private readonly source: DashboardSource,
    private readonly peakFormat: PeakFormatOptions,
  ) {}

  async getMetrics(): Promise<MetricSlots> {
    const widgets = await this.source.fetchWidgets();
    if (!widgets.length) {
      logger.warn({ dashboardGuid: this.source.dashboardGuid }, 'No widgets returned from dashboard');
    }
    const metrics = parseWidgets(widgets, this.peakFormat);
    logger.debug({ metrics, widgets: widgets.length }, 'Normalized metrics');
    return metrics;
  }
}
