import axios from 'axios';
import { NerdGraphDashboardResponseSchema } from '../schemas/report.js';
import type { WidgetRecord } from '../types.js';
import { logger } from '../logger.js';

/**
 * Anything that can hand over the widgets of one dashboard.
 */
export interface DashboardSource {
  readonly dashboardGuid: string;
  fetchWidgets(): Promise<WidgetRecord[]>;
}

export class DashboardQueryError extends Error {
  constructor(
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'DashboardQueryError';
  }
}

export interface NewRelicClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  http?: ReturnType<typeof axios.create>; // injected in tests
}

const DASHBOARD_WIDGETS_QUERY = `
query DashboardWidgets($guid: EntityGuid!) {
  actor {
    entity(guid: $guid) {
      ... on DashboardEntity {
        pages {
          widgets {
            id
            title
            visualization { id }
            rawConfiguration
            layout { column row width height }
            data {
              raw
              visualization
            }
          }
        }
      }
    }
  }
}`;

/**
 * NerdGraph (GraphQL) client for dashboard widgets.
 */
export class NewRelicDashboardClient implements DashboardSource {
  private axios: ReturnType<typeof axios.create>;

  constructor(
    private readonly apiKey: string,
    readonly dashboardGuid: string,
    opts: NewRelicClientOptions = {},
  ) {
    if (!apiKey) {
      throw new Error('A New Relic API key is required to initialize NewRelicDashboardClient');
    }
    this.axios =
      opts.http ??
      axios.create({
        baseURL: opts.baseUrl ?? 'https://api.newrelic.com/graphql',
        timeout: opts.timeoutMs ?? 30000,
      });
  }

  /**
   * Return all widgets across every page of the configured dashboard.
   */
  async fetchWidgets(): Promise<WidgetRecord[]> {
    logger.info({ dashboardGuid: this.dashboardGuid }, 'Fetching dashboard widgets');
    const { data } = await this.axios.post<unknown>(
      '',
      { query: DASHBOARD_WIDGETS_QUERY, variables: { guid: this.dashboardGuid } },
      { headers: { 'API-Key': this.apiKey, 'Content-Type': 'application/json' } },
    );

    const parsed = NerdGraphDashboardResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new DashboardQueryError('Dashboard query returned an unexpected payload', parsed.error.issues);
    }

    const errors = parsed.data.errors ?? [];
    if (errors.length > 0) {
      logger.error({ errors }, 'NerdGraph returned errors');
      throw new DashboardQueryError(`Dashboard query failed: ${errors.map((e) => e.message).join('; ')}`, errors);
    }

    const pages = parsed.data.data?.actor?.entity?.pages ?? [];
    const widgets = pages.flatMap((page) => page.widgets ?? []);
    logger.debug({ count: widgets.length }, 'Fetched widgets');
    return widgets;
  }
}
