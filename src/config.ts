/**
 * Centralized configuration loader for TPS Pulse.
 * Reads environment variables, parses types, and exposes a typed config object.
 *
 * Environment variables (see .env.example):
 * - NEW_RELIC_ACCOUNT_ID, DASHBOARD_GUID (required)
 * - NEW_RELIC_GRAPHQL_URL (default: https://api.newrelic.com/graphql)
 * - SECRETS_PROVIDER=env|file (default: env), SECRETS_FILE (for file)
 * - THRESHOLD_CAPACITY_WARNING (default: 70), THRESHOLD_CAPACITY_CRITICAL (default: 85)
 * - REPORT_TIMEZONE (default: America/New_York), REPORT_TIMEZONE_LABEL (default: ET)
 * - EVENT_NAME, DASHBOARD_URL, REPORT_USER_NAME
 * - SECRET_ID_NEW_RELIC_API_KEY, SECRET_ID_SLACK_WEBHOOK, SECRET_ID_O365_CREDENTIALS
 * - EMAIL_RECIPIENTS (comma separated)
 * - LOG_LEVEL (default: info)
 */

import { config } from 'dotenv';
import { ThresholdsSchema } from './schemas/report.js';
import type { Thresholds } from './types.js';

// Load environment variables from .env file
config();

export type SecretsProviderName = 'env' | 'file';

export interface ReportSettings {
  timeZone: string;
  zoneLabel: string;
  eventName: string;
  dashboardUrl: string;
  userName: string;
}

export interface SecretRefs {
  newRelicApiKey: string;
  slackWebhook?: string;
  o365Credentials?: string;
}

export interface AppConfig {
  newRelicAccountId: string;
  dashboardGuid: string;
  newRelicGraphqlUrl: string;
  secretsProvider: SecretsProviderName;
  secretsFile?: string;
  thresholds: Thresholds;
  report: ReportSettings;
  secretRefs: SecretRefs;
  emailRecipients: string[];
  logLevel: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value || value.trim() === '') return fallback;
  const n = Number(value);
  return Number.isFinite(n) ? n : Number.NaN;
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Load an additional env file (e.g. from --env-file). Its values replace
 * whatever .env or the shell already set.
 */
export function loadEnvFile(path: string): void {
  const result = config({ path, override: true });
  if (result.error) {
    throw new ConfigError(`Could not load env file ${path}: ${result.error.message}`);
  }
}

export function getConfig(): AppConfig {
  const secretsProvider: SecretsProviderName = process.env.SECRETS_PROVIDER?.trim().toLowerCase() === 'file' ? 'file' : 'env';

  const thresholds = {
    warning: parseNumber(process.env.THRESHOLD_CAPACITY_WARNING, 70),
    critical: parseNumber(process.env.THRESHOLD_CAPACITY_CRITICAL, 85),
  };

  const report = {
    timeZone: optional(process.env.REPORT_TIMEZONE) ?? 'America/New_York',
    zoneLabel: optional(process.env.REPORT_TIMEZONE_LABEL) ?? 'ET',
    eventName: optional(process.env.EVENT_NAME) ?? 'Weekend Performance Report',
    dashboardUrl: process.env.DASHBOARD_URL?.trim() ?? '',
    userName: optional(process.env.REPORT_USER_NAME) ?? 'SRE Automation',
  };

  const secretRefs = {
    newRelicApiKey: optional(process.env.SECRET_ID_NEW_RELIC_API_KEY) ?? 'prod/newrelic/api-key',
    slackWebhook: optional(process.env.SECRET_ID_SLACK_WEBHOOK),
    o365Credentials: optional(process.env.SECRET_ID_O365_CREDENTIALS),
  };

  const emailRecipients = (process.env.EMAIL_RECIPIENTS ?? '')
    .split(',')
    .map((r) => r.trim())
    .filter(Boolean);

  return {
    newRelicAccountId: process.env.NEW_RELIC_ACCOUNT_ID?.trim() ?? '',
    dashboardGuid: process.env.DASHBOARD_GUID?.trim() ?? '',
    newRelicGraphqlUrl: optional(process.env.NEW_RELIC_GRAPHQL_URL) ?? 'https://api.newrelic.com/graphql',
    secretsProvider,
    secretsFile: optional(process.env.SECRETS_FILE),
    thresholds,
    report,
    secretRefs,
    emailRecipients,
    logLevel: optional(process.env.LOG_LEVEL) ?? 'info',
  };
}

/**
 * Assert the variables a report run cannot do without.
 */
export function assertRequiredConfig(cfg: AppConfig) {
  if (!cfg.newRelicAccountId) {
    throw new ConfigError('NEW_RELIC_ACCOUNT_ID environment variable is required');
  }
  if (!cfg.dashboardGuid) {
    throw new ConfigError('DASHBOARD_GUID environment variable is required');
  }
  const thresholds = ThresholdsSchema.safeParse(cfg.thresholds);
  if (!thresholds.success) {
    throw new ConfigError(`Invalid capacity thresholds: ${thresholds.error.issues.map((i) => i.message).join('; ')}`);
  }
  if (cfg.secretsProvider === 'file' && !cfg.secretsFile) {
    throw new ConfigError('SECRETS_FILE is required when SECRETS_PROVIDER=file');
  }
}
