import type { AppConfig } from '../config.js';
import { AnalysisResultSchema, ReportContextSchema } from '../schemas/report.js';
import type { AnalysisResult, MetricSlots } from '../types.js';
import { logger } from '../logger.js';
import { DashboardService } from './dashboard.js';
import { ConsoleDelivery, type DeliveryChannel, type ReportDelivery } from './delivery.js';
import { NewRelicDashboardClient, type DashboardSource } from './newrelic.js';
import { buildReportContext } from './reportContext.js';
import { DEFAULT_TEMPLATE, TemplateRenderer } from './renderer.js';
import { extractSecretField, type SecretsProvider } from './secrets.js';
import { translateTrends } from './trendTranslator.js';

export type PipelineErrorCode = 'NO_METRICS' | 'MISSING_API_KEY' | 'INVALID_ANALYSIS';

export class ReportPipelineError extends Error {
  constructor(
    message: string,
    public readonly code: PipelineErrorCode,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'ReportPipelineError';
  }
}

export interface PipelineDeps {
  config: AppConfig;
  secrets: SecretsProvider;
  renderer?: TemplateRenderer;
  dashboard?: DashboardSource; // built from config + secrets when omitted
  now?: () => Date;
}

export interface PipelineRunOptions {
  deliveries?: ReportDelivery[];
  eventName?: string;
  templateName?: string;
}

export interface PipelineResult {
  report: string;
  metrics: MetricSlots;
  analysis: AnalysisResult;
  delivered: Partial<Record<DeliveryChannel, boolean>>;
}

/**
 * Resolve the dashboard API key; a bare string secret or an api_key/key field.
 */
export async function resolveApiKey(config: AppConfig, secrets: SecretsProvider): Promise<string> {
  const secretId = config.secretRefs.newRelicApiKey;
  const apiKey = extractSecretField(await secrets.getSecret(secretId), ['api_key', 'key']);
  if (!apiKey) {
    throw new ReportPipelineError(`Secret ${secretId} did not contain a New Relic API key`, 'MISSING_API_KEY');
  }
  return apiKey;
}

async function deliver(
  report: string,
  eventName: string,
  deliveries: ReportDelivery[],
): Promise<PipelineResult['delivered']> {
  const targets = deliveries.length ? deliveries : [new ConsoleDelivery()];
  if (!deliveries.length) {
    logger.info('No delivery channels configured; printing to stdout');
  }

  const delivered: PipelineResult['delivered'] = {};
  const message = { subject: `TPS Report: ${eventName}`, text: report };
  for (const target of targets) {
    try {
      delivered[target.channel] = await target.send(message);
    } catch (err) {
      logger.error({ err, channel: target.channel }, 'Delivery failed');
      delivered[target.channel] = false;
    }
  }
  return delivered;
}

/**
 * One report cycle: fetch widgets, normalize, translate, render, deliver.
 */
export async function runReportPipeline(deps: PipelineDeps, opts: PipelineRunOptions = {}): Promise<PipelineResult> {
  const { config, secrets } = deps;
  const dashboard =
    deps.dashboard ??
    new NewRelicDashboardClient(await resolveApiKey(config, secrets), config.dashboardGuid, {
      baseUrl: config.newRelicGraphqlUrl,
    });

  const metrics = await new DashboardService(dashboard, config.report).getMetrics();
  if (!Object.keys(metrics).length) {
    throw new ReportPipelineError('No metrics could be parsed from the dashboard response', 'NO_METRICS');
  }

  const analysis = translateTrends(metrics, config.thresholds);
  const checked = AnalysisResultSchema.safeParse(analysis);
  if (!checked.success) {
    throw new ReportPipelineError('Trend analysis produced an invalid result', 'INVALID_ANALYSIS', checked.error.issues);
  }

  const eventName = opts.eventName || config.report.eventName;
  const context = ReportContextSchema.parse(
    buildReportContext(metrics, analysis, config.report, { eventName, now: deps.now?.() }),
  );
  const renderer = deps.renderer ?? new TemplateRenderer();
  const report = await renderer.render(opts.templateName ?? DEFAULT_TEMPLATE, context);

  logger.info(
    { slots: Object.keys(metrics), trafficStatus: analysis.trafficStatus, capacityStatus: analysis.capacityStatus },
    'Report rendered',
  );

  const delivered = await deliver(report, eventName, opts.deliveries ?? []);
  const failed = Object.entries(delivered)
    .filter(([, ok]) => !ok)
    .map(([channel]) => channel);
  if (failed.length) {
    logger.warn({ failed }, 'Report delivery failed on some channels');
  }

  return { report, metrics, analysis, delivered };
}
