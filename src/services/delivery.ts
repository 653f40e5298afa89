import axios from 'axios';
import { pick } from '../utils/data.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../logger.js';

export type DeliveryChannel = 'console' | 'slack' | 'email';

export interface ReportMessage {
  subject: string;
  text: string;
}

/**
 * A destination for a finished report. send() resolves false when the channel
 * rejected the message.
 */
export interface ReportDelivery {
  readonly channel: DeliveryChannel;
  send(message: ReportMessage): Promise<boolean>;
}

export class DeliveryError extends Error {
  constructor(
    message: string,
    public readonly channel: DeliveryChannel,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'DeliveryError';
  }
}

type HttpClient = ReturnType<typeof axios.create>;

function describeHttpError(error: unknown): Record<string, unknown> {
  if (axios.isAxiosError(error)) {
    return {
      status: error.response?.status,
      statusText: error.response?.statusText,
      message: error.message,
    };
  }
  return { message: errorMessage(error) };
}

export class ConsoleDelivery implements ReportDelivery {
  readonly channel = 'console';

  constructor(private readonly write: (text: string) => void = (text) => process.stdout.write(text)) {}

  async send(message: ReportMessage): Promise<boolean> {
    this.write(`${message.text}\n`);
    return true;
  }
}

/**
 * Posts the report to a Slack incoming webhook.
 */
export class SlackDelivery implements ReportDelivery {
  readonly channel = 'slack';
  private http: HttpClient;

  constructor(
    private readonly webhookUrl: string,
    http?: HttpClient,
  ) {
    this.http = http ?? axios.create({ timeout: 10000 });
  }

  async send(message: ReportMessage): Promise<boolean> {
    try {
      await this.http.post(this.webhookUrl, { text: message.text, mrkdwn: true });
      logger.info('Report sent to Slack');
      return true;
    } catch (error) {
      logger.error(describeHttpError(error), 'Failed to send Slack message');
      return false;
    }
  }
}

export interface GraphCredentials {
  tenantId: string;
  clientId: string;
  clientSecret: string;
  senderEmail: string;
}

interface CachedToken {
  accessToken: string;
  expiresAt: number; // ms epoch
}

const GRAPH_SCOPE = 'https://graph.microsoft.com/.default';
// Refresh tokens a minute before they lapse.
const TOKEN_EXPIRY_SKEW_MS = 60_000;

/**
 * Sends the report as an HTML email through Microsoft Graph, authenticating
 * with the OAuth 2.0 client-credentials flow.
 */
export class GraphEmailDelivery implements ReportDelivery {
  readonly channel = 'email';
  private http: HttpClient;
  private token?: CachedToken;
  private now: () => number;

  constructor(
    private readonly credentials: GraphCredentials,
    private readonly recipients: readonly string[],
    opts: { http?: HttpClient; now?: () => number } = {},
  ) {
    this.http = opts.http ?? axios.create({ timeout: 10000 });
    this.now = opts.now ?? (() => Date.now());
  }

  async send(message: ReportMessage): Promise<boolean> {
    const token = await this.getToken();
    const payload = {
      message: {
        subject: message.subject,
        body: { contentType: 'HTML', content: message.text.replace(/\n/g, '<br>') },
        toRecipients: this.recipients
          .map((recipient) => recipient.trim())
          .filter(Boolean)
          .map((address) => ({ emailAddress: { address } })),
      },
      saveToSentItems: 'true',
    };

    try {
      await this.http.post(
        `https://graph.microsoft.com/v1.0/users/${encodeURIComponent(this.credentials.senderEmail)}/sendMail`,
        payload,
        { headers: { Authorization: `Bearer ${token}` } },
      );
      logger.info({ recipients: this.recipients.length }, 'Report email sent via Microsoft Graph');
      return true;
    } catch (error) {
      logger.error(describeHttpError(error), 'Failed to send email');
      return false;
    }
  }

  private async getToken(): Promise<string> {
    if (this.token && this.token.expiresAt - TOKEN_EXPIRY_SKEW_MS > this.now()) {
      return this.token.accessToken;
    }

    const form = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.credentials.clientId,
      client_secret: this.credentials.clientSecret,
      scope: GRAPH_SCOPE,
    });

    let data: unknown;
    try {
      ({ data } = await this.http.post<unknown>(
        `https://login.microsoftonline.com/${encodeURIComponent(this.credentials.tenantId)}/oauth2/v2.0/token`,
        form.toString(),
        { headers: { 'Content-Type': 'application/x-www-form-urlencoded' } },
      ));
    } catch (error) {
      throw new DeliveryError('Failed to acquire access token', 'email', describeHttpError(error));
    }

    const accessToken = pick(data, 'access_token');
    if (typeof accessToken !== 'string' || !accessToken) {
      throw new DeliveryError('Token response did not contain an access token', 'email', pick(data, 'error'));
    }
    const expiresIn = Number(pick(data, 'expires_in') ?? 0);
    this.token = {
      accessToken,
      expiresAt: this.now() + (Number.isFinite(expiresIn) ? expiresIn : 0) * 1000,
    };
    return accessToken;
  }
}
