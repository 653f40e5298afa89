#!/usr/bin/env node
import path from 'node:path';
import { parseArgs } from 'node:util';
import { assertRequiredConfig, getConfig, loadEnvFile, type AppConfig } from './config.js';
import { logger } from './logger.js';
import {
  ConsoleDelivery,
  GraphEmailDelivery,
  SlackDelivery,
  type ReportDelivery,
} from './services/delivery.js';
import { runReportPipeline } from './services/pipeline.js';
import { DEFAULT_TEMPLATES_DIR, TemplateRenderer } from './services/renderer.js';
import { createSecretsProvider, extractSecretField, type SecretsProvider } from './services/secrets.js';

const DELIVERY_MODES = ['console', 'slack', 'email', 'both'] as const;
type DeliveryMode = (typeof DELIVERY_MODES)[number];

function isDeliveryMode(value: string): value is DeliveryMode {
  return DELIVERY_MODES.some((mode) => mode === value);
}

const USAGE = `Usage: tps-pulse [options]

Generate TPS/capacity status reports from a New Relic dashboard.

Options:
  --env-file <path>        Load an additional .env file
  --delivery <mode>        console | slack | email | both (default: slack)
  --event-name <name>      Override the event name in the report
  --templates-dir <dir>    Directory containing report templates
  --log-level <level>      pino log level (default: LOG_LEVEL or info)
  -h, --help               Show this help`;

async function buildSlackDelivery(config: AppConfig, secrets: SecretsProvider): Promise<SlackDelivery | undefined> {
  const secretId = config.secretRefs.slackWebhook;
  if (!secretId) {
    logger.warn('Slack delivery requested but SECRET_ID_SLACK_WEBHOOK not configured');
    return undefined;
  }
  const webhook = extractSecretField(await secrets.getSecret(secretId), ['url', 'webhook']);
  if (!webhook) {
    logger.warn({ secretId }, 'Slack secret did not contain a webhook URL');
    return undefined;
  }
  return new SlackDelivery(webhook);
}

async function buildEmailDelivery(config: AppConfig, secrets: SecretsProvider): Promise<GraphEmailDelivery | undefined> {
  const secretId = config.secretRefs.o365Credentials;
  if (!secretId) {
    logger.warn('Email delivery requested but SECRET_ID_O365_CREDENTIALS not configured');
    return undefined;
  }
  const payload = await secrets.getSecret(secretId);
  if (typeof payload !== 'object') {
    logger.warn({ secretId }, 'O365 secret must be a JSON object');
    return undefined;
  }
  const tenantId = extractSecretField(payload, ['tenant_id', 'tenant']);
  const clientId = extractSecretField(payload, ['client_id', 'app_id']);
  const clientSecret = extractSecretField(payload, ['client_secret', 'secret']);
  const senderEmail = extractSecretField(payload, ['sender_email', 'from']);
  if (!tenantId || !clientId || !clientSecret || !senderEmail) {
    logger.warn({ secretId }, 'O365 secret missing required fields');
    return undefined;
  }
  if (!config.emailRecipients.length) {
    logger.warn('EMAIL_RECIPIENTS not configured; skipping email delivery');
    return undefined;
  }
  return new GraphEmailDelivery({ tenantId, clientId, clientSecret, senderEmail }, config.emailRecipients);
}

async function buildDeliveries(config: AppConfig, secrets: SecretsProvider, mode: DeliveryMode): Promise<ReportDelivery[]> {
  const deliveries: ReportDelivery[] = [];
  if (mode === 'console') {
    deliveries.push(new ConsoleDelivery());
  }
  if (mode === 'slack' || mode === 'both') {
    const slack = await buildSlackDelivery(config, secrets);
    if (slack) deliveries.push(slack);
  }
  if (mode === 'email' || mode === 'both') {
    const email = await buildEmailDelivery(config, secrets);
    if (email) deliveries.push(email);
  }
  return deliveries;
}

async function main() {
  const { values } = parseArgs({
    options: {
      'env-file': { type: 'string' },
      delivery: { type: 'string', default: 'slack' },
      'event-name': { type: 'string' },
      'templates-dir': { type: 'string', default: DEFAULT_TEMPLATES_DIR },
      'log-level': { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }
  const delivery = values.delivery ?? 'slack';
  if (!isDeliveryMode(delivery)) {
    throw new Error(`--delivery must be one of ${DELIVERY_MODES.join(', ')}`);
  }

  if (values['env-file']) {
    loadEnvFile(path.resolve(values['env-file']));
  }
  const config = getConfig();
  assertRequiredConfig(config);
  logger.level = values['log-level'] ?? config.logLevel;

  const secrets = createSecretsProvider(config);
  const deliveries = await buildDeliveries(config, secrets, delivery);

  const { delivered } = await runReportPipeline(
    { config, secrets, renderer: new TemplateRenderer(path.resolve(values['templates-dir'] ?? DEFAULT_TEMPLATES_DIR)) },
    { deliveries, eventName: values['event-name'] },
  );

  if (Object.values(delivered).some((ok) => !ok)) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  logger.error({ err: error }, 'TPS report run failed');
  process.exit(1);
});
