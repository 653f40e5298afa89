import { describe, expect, it } from 'vitest';
import { ConsoleDelivery, DeliveryError, GraphEmailDelivery, SlackDelivery } from '../src/services/delivery.js';
import { stubHttp } from './support/stubHttp.js';

const MESSAGE = { subject: 'TPS Report: Test Event', text: 'line one\nline two' };
const CREDENTIALS = {
  tenantId: 'test-tenant',
  clientId: 'test-client',
  clientSecret: 'test-secret',
  senderEmail: 'reports@example.com',
};

describe('ConsoleDelivery', () => {
  it('writes the report text with a trailing newline', async () => {
    const written: string[] = [];
    await expect(new ConsoleDelivery((text) => written.push(text)).send(MESSAGE)).resolves.toBe(true);
    expect(written).toEqual(['line one\nline two\n']);
  });
});

describe('SlackDelivery', () => {
  it('posts the report text to the webhook', async () => {
    const { http, requests } = stubHttp(() => 'ok');
    const slack = new SlackDelivery('https://hooks.example.test/webhook', http);

    await expect(slack.send(MESSAGE)).resolves.toBe(true);
    expect(requests[0].url).toBe('https://hooks.example.test/webhook');
    expect(requests[0].body).toEqual({ text: 'line one\nline two', mrkdwn: true });
  });

  it('resolves false when the webhook rejects the message', async () => {
    const { http } = stubHttp(() => {
      throw new Error('invalid_payload');
    });
    await expect(new SlackDelivery('https://hooks.example.test/webhook', http).send(MESSAGE)).resolves.toBe(false);
  });
});

describe('GraphEmailDelivery', () => {
  it('acquires a token once and sends mail with it', async () => {
    const { http, requests } = stubHttp((request) =>
      request.url?.includes('/oauth2/') ? { access_token: 'test-token', expires_in: 3600 } : '',
    );
    const email = new GraphEmailDelivery(CREDENTIALS, ['sre@example.com', ' ops@example.com '], {
      http,
      now: () => 1_000_000,
    });

    await expect(email.send(MESSAGE)).resolves.toBe(true);
    await expect(email.send(MESSAGE)).resolves.toBe(true);

    expect(requests.map((r) => r.url)).toEqual([
      'https://login.microsoftonline.com/test-tenant/oauth2/v2.0/token',
      'https://graph.microsoft.com/v1.0/users/reports%40example.com/sendMail',
      'https://graph.microsoft.com/v1.0/users/reports%40example.com/sendMail',
    ]);
    expect(requests[0].body).toBe(
      'grant_type=client_credentials&client_id=test-client&client_secret=test-secret&scope=https%3A%2F%2Fgraph.microsoft.com%2F.default',
    );
    expect(requests[1].header('Authorization')).toBe('Bearer test-token');
    expect(requests[1].body).toEqual({
      message: {
        subject: 'TPS Report: Test Event',
        body: { contentType: 'HTML', content: 'line one<br>line two' },
        toRecipients: [
          { emailAddress: { address: 'sre@example.com' } },
          { emailAddress: { address: 'ops@example.com' } },
        ],
      },
      saveToSentItems: 'true',
    });
  });

  it('refreshes the token once it is about to expire', async () => {
    let clock = 0;
    const { http, requests } = stubHttp((request) =>
      request.url?.includes('/oauth2/') ? { access_token: 'test-token', expires_in: 120 } : '',
    );
    const email = new GraphEmailDelivery(CREDENTIALS, ['sre@example.com'], { http, now: () => clock });

    await email.send(MESSAGE);
    clock = 61_000;
    await email.send(MESSAGE);

    expect(requests.filter((r) => r.url?.includes('/oauth2/'))).toHaveLength(2);
  });

  it('raises when the token response has no access token', async () => {
    const { http } = stubHttp(() => ({ error: 'invalid_client' }));
    const sending = new GraphEmailDelivery(CREDENTIALS, ['sre@example.com'], { http }).send(MESSAGE);
    await expect(sending).rejects.toBeInstanceOf(DeliveryError);
    await expect(sending).rejects.toThrowError('Token response did not contain an access token');
  });

  it('resolves false when sendMail fails', async () => {
    const { http } = stubHttp((request) => {
      if (request.url?.includes('/oauth2/')) return { access_token: 'test-token', expires_in: 3600 };
      throw new Error('mailbox not found');
    });
    await expect(new GraphEmailDelivery(CREDENTIALS, ['sre@example.com'], { http }).send(MESSAGE)).resolves.toBe(false);
  });
});
