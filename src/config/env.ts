// src/config/env.ts

import type { RelayConfig, RelayConfigInput } from './ConfigValidator';
import { validateConfig } from './ConfigValidator';

export interface ServerConfig {
  port: number;
  relay: RelayConfig;
}

function numberFrom(value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  return Number(value);
}

function storeBackend(url: string): 'redis' | 'postgres' | 'memory' {
  if (url.startsWith('redis://') || url.startsWith('rediss://')) return 'redis';
  if (url.startsWith('postgres://') || url.startsWith('postgresql://')) return 'postgres';
  return 'memory';
}

/**
 * Build the relay configuration from environment variables.
 * A per-user store is used only when CONFIG_STORE_URL is set; otherwise the
 * CLIENT_ID / GITHUB_* variables describe the single tenant.
 *
 * @throws {z.ZodError} If a value is out of range
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const storeUrl = env.CONFIG_STORE_URL;
  const encryptionKey = env.CONFIG_ENCRYPTION_KEY;
  const previousKeys = env.CONFIG_ENCRYPTION_PREVIOUS_KEYS;

  const input: RelayConfigInput = {
    http: { timeoutMs: numberFrom(env.HTTP_TIMEOUT_MS) },
    auth: {
      tokenEndpoint: env.SPOTIFY_TOKEN_ENDPOINT || undefined,
      authorizeEndpoint: env.SPOTIFY_AUTHORIZE_ENDPOINT || undefined,
    },
    upstream: { baseUrl: env.SPOTIFY_API_BASE_URL || undefined },
    store: { baseUrl: env.GITHUB_API_BASE_URL || undefined },
    configStore: storeUrl
      ? {
          backend: storeBackend(storeUrl),
          url: storeBackend(storeUrl) === 'memory' ? undefined : storeUrl,
          encryption: encryptionKey
            ? {
                key: encryptionKey,
                previousKeys: previousKeys ? previousKeys.split(',').map((key) => key.trim()) : undefined,
              }
            : undefined,
        }
      : undefined,
    defaultUser: {
      clientId: env.CLIENT_ID ?? '',
      clientSecret: env.CLIENT_SECRET ?? '',
      gistId: env.GITHUB_GIST_ID ?? '',
      githubToken: env.GITHUB_TOKEN ?? '',
      gistFilename: env.GIST_FILENAME || undefined,
      redirectUri: env.REDIRECT_URI ?? '',
      apiKey: env.APP_API_KEY ?? '',
    },
    logging: {
      level: parseLevel(env.LOG_LEVEL),
      format: env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json',
    },
    metrics: {
      enabled: env.METRICS_ENABLED !== 'false',
      port: numberFrom(env.METRICS_PORT),
    },
  };

  return {
    port: numberFrom(env.PORT) ?? 3000,
    relay: validateConfig(input),
  };
}

function parseLevel(value: string | undefined): 'debug' | 'info' | 'warn' | 'error' | undefined {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return value;
    default:
      return undefined;
  }
}
