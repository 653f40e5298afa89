#!/usr/bin/env node
import { assertRequiredConfig, getConfig } from '../config.js';
import { NewRelicDashboardClient } from '../services/newrelic.js';
import { resolveApiKey } from '../services/pipeline.js';
import { createSecretsProvider } from '../services/secrets.js';
import { translateTrends } from '../services/trendTranslator.js';
import { parseWidgets } from '../services/widgetParser.js';
import { errorMessage } from '../utils/errors.js';

async function main() {
  const config = getConfig();
  assertRequiredConfig(config);

  const apiKey = await resolveApiKey(config, createSecretsProvider(config));
  const client = new NewRelicDashboardClient(apiKey, config.dashboardGuid, { baseUrl: config.newRelicGraphqlUrl });
  console.log('[SMOKE] Fetching widgets for dashboard:', config.dashboardGuid);

  const widgets = await client.fetchWidgets();
  console.log('[SMOKE] Widgets fetched:', widgets.length);
  console.log('[SMOKE] Titles:', widgets.map((w) => w.title));

  const metrics = parseWidgets(widgets, config.report);
  console.log('[SMOKE] Normalized metrics:', JSON.stringify(metrics, null, 2));
  console.log('[SMOKE] Analysis:', JSON.stringify(translateTrends(metrics, config.thresholds), null, 2));
}

main().catch((e) => {
  console.error('[SMOKE] Error:', errorMessage(e));
  process.exit(1);
});
