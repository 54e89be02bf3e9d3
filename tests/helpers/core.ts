// tests/helpers/core.ts

import { Logger } from '../../src/observability/Logger';
import { MetricsCollector } from '../../src/observability/MetricsCollector';
import { HttpCore } from '../../src/core/http/HttpCore';
import { GistTokenStore } from '../../src/core/token/GistTokenStore';
import { TokenRenewer } from '../../src/core/auth/TokenRenewer';
import { RenewalLock } from '../../src/core/token/RenewalLock';
import { TokenAccessor } from '../../src/core/token/TokenAccessor';
import { UpstreamDispatcher } from '../../src/core/http/UpstreamDispatcher';
import { PlayerService } from '../../src/player/PlayerService';
import { DEFAULT_SCOPES } from '../../src/core/auth/types';
import type { ClientCredentials, StorageLocator, TokenRecord } from '../../src/core/token/types';

export const GITHUB_API = 'https://api.github.com';
export const ACCOUNTS = 'https://accounts.spotify.com';
export const SPOTIFY_API = 'https://api.spotify.com';

export const GIST_ID = 'gist123abc456';
export const GIST_PATH = `/gists/${GIST_ID}`;
export const SLOT = 'spotify_tokens.json';

export const credentials: ClientCredentials = {
  clientId: 'test-client-id',
  clientSecret: 'test-secret',
};

export const locator: StorageLocator = {
  documentId: GIST_ID,
  accessCredential: 'test-github-token',
  slotName: SLOT,
};

// base64("test-client-id:test-secret")
export const BASIC_AUTH = `Basic ${Buffer.from('test-client-id:test-secret').toString('base64')}`;

// 2023-11-14T22:13:20Z, a whole second
export const NOW = 1_700_000_000;

export function gistBody(record: Partial<TokenRecord>, slot = SLOT): Record<string, unknown> {
  return {
    id: GIST_ID,
    files: {
      [slot]: { filename: slot, content: JSON.stringify(record) },
    },
  };
}

/**
 * Slot content sent in a PATCH body
 */
export function savedRecord(body: unknown, slot = SLOT): TokenRecord | null {
  if (!body || typeof body !== 'object' || !('files' in body)) return null;
  const files = body.files;
  if (!files || typeof files !== 'object' || !(slot in files)) return null;
  const file: unknown = Reflect.get(files, slot);
  if (!file || typeof file !== 'object' || !('content' in file) || typeof file.content !== 'string') {
    return null;
  }
  const parsed: unknown = JSON.parse(file.content);
  if (
    parsed &&
    typeof parsed === 'object' &&
    'access_token' in parsed &&
    'refresh_token' in parsed &&
    'expires_at' in parsed &&
    typeof parsed.access_token === 'string' &&
    typeof parsed.refresh_token === 'string' &&
    typeof parsed.expires_at === 'number'
  ) {
    return {
      access_token: parsed.access_token,
      refresh_token: parsed.refresh_token,
      expires_at: parsed.expires_at,
    };
  }
  return null;
}

export interface Core {
  logger: Logger;
  metrics: MetricsCollector;
  http: HttpCore;
  store: GistTokenStore;
  renewer: TokenRenewer;
  lock: RenewalLock;
  accessor: TokenAccessor;
  dispatcher: UpstreamDispatcher;
  player: PlayerService;
}

/**
 * Real components wired against the public hosts; tests intercept with nock.
 */
export function createCore(): Core {
  const logger = new Logger({ silent: true });
  const metrics = new MetricsCollector({}, logger);
  const http = new HttpCore({ timeoutMs: 10000, keepAlive: false }, metrics, logger);
  const store = new GistTokenStore({ baseUrl: GITHUB_API }, http, metrics, logger);
  const renewer = new TokenRenewer(
    {
      issuer: ACCOUNTS,
      authorizeEndpoint: `${ACCOUNTS}/authorize`,
      tokenEndpoint: `${ACCOUNTS}/api/token`,
      scopes: DEFAULT_SCOPES,
      timeoutMs: 10000,
      defaultExpiresIn: 3600,
    },
    http,
    store,
    metrics,
    logger
  );
  const lock = new RenewalLock(logger);
  const accessor = new TokenAccessor(
    { graceSeconds: 300, defaultExpiresIn: 3600 },
    store,
    renewer,
    lock,
    logger
  );
  const dispatcher = new UpstreamDispatcher(
    { baseUrl: `${SPOTIFY_API}/v1` },
    http,
    accessor,
    metrics,
    logger
  );
  const player = new PlayerService(accessor, dispatcher, logger);

  return { logger, metrics, http, store, renewer, lock, accessor, dispatcher, player };
}
