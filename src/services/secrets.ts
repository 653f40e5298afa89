import { promises as fs } from 'node:fs';
import type { AppConfig } from '../config.js';
import { isRecord } from '../utils/data.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../logger.js';

/**
 * A secret is either a bare string (a URL, an API key) or a JSON object of fields.
 */
export type SecretPayload = string | Readonly<Record<string, unknown>> | undefined;

export interface SecretsProvider {
  getSecret(secretId: string): Promise<SecretPayload>;
}

export class SecretResolutionError extends Error {
  constructor(
    message: string,
    public readonly secretId?: string,
  ) {
    super(message);
    this.name = 'SecretResolutionError';
  }
}

function maybeParseJson(value: string): SecretPayload {
  const trimmed = value.trim();
  if (!trimmed.startsWith('{')) return value;
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return isRecord(parsed) ? parsed : value;
  } catch {
    return value;
  }
}

export function toSecretPayload(value: unknown): SecretPayload {
  if (typeof value === 'string') return value ? maybeParseJson(value) : undefined;
  if (isRecord(value)) return value;
  return undefined;
}

/**
 * "prod/newrelic/api-key" => "SECRET_PROD_NEWRELIC_API_KEY"
 */
export function secretEnvName(secretId: string): string {
  const suffix = secretId
    .toUpperCase()
    .replace(/[^A-Z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return `SECRET_${suffix}`;
}

/**
 * Resolves secrets from environment variables named after the secret id.
 */
export class EnvSecretsProvider implements SecretsProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async getSecret(secretId: string): Promise<SecretPayload> {
    const name = secretEnvName(secretId);
    logger.debug({ secretId, variable: name }, 'Resolving secret from environment');
    return toSecretPayload(this.env[name]);
  }
}

/**
 * Resolves secrets from a JSON file holding an object keyed by secret id.
 * The file is read once per provider.
 */
export class FileSecretsProvider implements SecretsProvider {
  private secrets?: Promise<Readonly<Record<string, unknown>>>;

  constructor(private readonly path: string) {}

  async getSecret(secretId: string): Promise<SecretPayload> {
    this.secrets ??= this.load();
    const secrets = await this.secrets;
    logger.debug({ secretId, path: this.path }, 'Resolving secret from file');
    return toSecretPayload(secrets[secretId]);
  }

  private async load(): Promise<Readonly<Record<string, unknown>>> {
    let raw: string;
    try {
      raw = await fs.readFile(this.path, 'utf-8');
    } catch (err) {
      throw new SecretResolutionError(`Could not read secrets file ${this.path}: ${errorMessage(err)}`);
    }
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new SecretResolutionError(`Secrets file ${this.path} is not valid JSON: ${errorMessage(err)}`);
    }
    if (!isRecord(data)) {
      throw new SecretResolutionError(`Secrets file ${this.path} must contain a JSON object`);
    }
    return data;
  }
}

/**
 * Extract a single string field from a secret payload, trying several keys.
 * A bare string payload is returned as-is.
 */
export function extractSecretField(payload: SecretPayload, keys: readonly string[], fallback?: string): string | undefined {
  if (payload === undefined) return fallback;
  if (typeof payload === 'string') return payload;
  for (const key of keys) {
    const value = payload[key];
    if (typeof value === 'string' && value) return value;
  }
  return fallback;
}

export function createSecretsProvider(cfg: Pick<AppConfig, 'secretsProvider' | 'secretsFile'>): SecretsProvider {
  switch (cfg.secretsProvider) {
    case 'env':
      return new EnvSecretsProvider();
    case 'file':
      if (!cfg.secretsFile) {
        throw new SecretResolutionError('SECRETS_FILE is required for the file secrets provider');
      }
      return new FileSecretsProvider(cfg.secretsFile);
    default:
      throw new SecretResolutionError(`Unsupported secrets provider: ${String(cfg.secretsProvider)}`);
  }
}
