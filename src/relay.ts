// src/relay.ts

import type { ClientCredentials, StorageLocator, TokenExchangeResult, TokenStatus } from './core/token/types';
import type { DispatchRequest, DispatchResponse } from './core/http/types';
import type { ConfigurationResolver, ResolvedUserConfig } from './core/config/types';
import { HttpCore } from './core/http/HttpCore';
import { UpstreamDispatcher } from './core/http/UpstreamDispatcher';
import { GistTokenStore } from './core/token/GistTokenStore';
import { RenewalLock } from './core/token/RenewalLock';
import { TokenAccessor } from './core/token/TokenAccessor';
import { TokenRenewer } from './core/auth/TokenRenewer';
import { LoginStateStore } from './core/auth/LoginStateStore';
import { DEFAULT_SCOPES } from './core/auth/types';
import { UserConfigStore } from './core/config/UserConfigStore';
import { StaticConfigResolver, STATIC_USER_ID } from './core/config/StaticConfigResolver';
import { PlayerService } from './player/PlayerService';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { validateConfig } from './config/ConfigValidator';
import type { RelayConfig, RelayConfigInput } from './config/ConfigValidator';
import { ConfigurationError, ValidationError } from './utils/errors';

const LOGIN_STATE_TTL_MS = 10 * 60 * 1000;
const LOGIN_STATE_CLEANUP_MS = 60 * 1000;

export interface RelayOptions {
  /** Overrides the resolver derived from configuration */
  resolver?: ConfigurationResolver;
}

export interface LoginCompletion {
  userId: string;
  result: TokenExchangeResult | null;
}

/**
 * Entry point of the relay: token lifecycle, upstream dispatch and playback
 * commands for callers identified by a ConfigurationResolver.
 */
export class PlaybackRelay {
  readonly logger: Logger;
  readonly metrics: MetricsCollector;
  readonly player: PlayerService;
  readonly resolver: ConfigurationResolver;
  /** Present when users are kept in a per-user store */
  readonly configStore?: UserConfigStore;

  private store: GistTokenStore;
  private renewer: TokenRenewer;
  private accessor: TokenAccessor;
  private dispatcher: UpstreamDispatcher;
  private loginStates: LoginStateStore;

  private constructor(
    private config: RelayConfig,
    options: RelayOptions
  ) {
    // Build dependencies leaf first
    const logger = new Logger(config.logging);
    const metrics = new MetricsCollector(config.metrics, logger);
    const http = new HttpCore(config.http, metrics, logger);
    const store = new GistTokenStore(config.store, http, metrics, logger);
    const renewer = new TokenRenewer(
      {
        issuer: config.auth.issuer,
        authorizeEndpoint: config.auth.authorizeEndpoint,
        tokenEndpoint: config.auth.tokenEndpoint,
        scopes: config.auth.scopes ?? DEFAULT_SCOPES,
        timeoutMs: config.http.timeoutMs,
        defaultExpiresIn: config.renewal.defaultExpiresIn,
      },
      http,
      store,
      metrics,
      logger
    );
    const accessor = new TokenAccessor(config.renewal, store, renewer, new RenewalLock(logger), logger);
    const dispatcher = new UpstreamDispatcher(config.upstream, http, accessor, metrics, logger);

    this.logger = logger;
    this.metrics = metrics;
    this.store = store;
    this.renewer = renewer;
    this.accessor = accessor;
    this.dispatcher = dispatcher;
    this.player = new PlayerService(accessor, dispatcher, logger);
    this.loginStates = new LoginStateStore(
      { ttlMs: LOGIN_STATE_TTL_MS, cleanupIntervalMs: LOGIN_STATE_CLEANUP_MS },
      logger
    );

    if (config.configStore) {
      this.configStore = new UserConfigStore(config.configStore, logger);
    }
    this.resolver =
      options.resolver ??
      this.configStore ??
      new StaticConfigResolver(
        config.defaultUser ?? {
          clientId: '',
          clientSecret: '',
          gistId: '',
          githubToken: '',
          gistFilename: '',
          redirectUri: '',
          apiKey: '',
        }
      );
  }

  /**
   * Validate configuration and wire the relay.
   *
   * With a per-user store and environment defaults carrying an API key, the
   * defaults are saved as the `default` user on first start.
   *
   * @throws {z.ZodError} If configuration is invalid
   *
   * @example
   * ```typescript
   * const relay = await PlaybackRelay.init({
   *   configStore: { backend: 'redis', url: process.env.CONFIG_STORE_URL },
   *   logging: { level: 'info', format: 'json' },
   * });
   * const token = await relay.getValidToken(credentials, locator);
   * ```
   */
  static async init(config: RelayConfigInput, options: RelayOptions = {}): Promise<PlaybackRelay> {
    const relay = new PlaybackRelay(validateConfig(config), options);
    await relay.seedDefaultUser();

    relay.logger.info('Playback relay initialized', {
      mode: relay.configStore ? 'multi-tenant' : 'single-tenant',
      graceSeconds: relay.config.renewal.graceSeconds,
    });
    return relay;
  }

  async getValidToken(credentials: ClientCredentials, locator: StorageLocator): Promise<string> {
    return this.accessor.getValidToken(credentials, locator);
  }

  async dispatch<T = unknown>(request: DispatchRequest): Promise<DispatchResponse<T>> {
    return this.dispatcher.dispatch<T>(request);
  }

  async renew(
    credentials: ClientCredentials,
    refreshToken: string,
    locator: StorageLocator
  ): Promise<TokenExchangeResult | null> {
    return this.renewer.renew(credentials, refreshToken, locator);
  }

  /**
   * Seed the slot with a token pair obtained elsewhere.
   *
   * @throws {ValidationError} Unless both tokens are given
   */
  async init(locator: StorageLocator, accessToken: string, refreshToken: string): Promise<boolean> {
    return this.accessor.initialize(locator, accessToken, refreshToken);
  }

  async exchangeCode(
    credentials: ClientCredentials,
    code: string,
    redirectUri: string,
    locator: StorageLocator
  ): Promise<TokenExchangeResult | null> {
    return this.renewer.exchangeCode(credentials, code, redirectUri, locator);
  }

  async forceRenew(
    credentials: ClientCredentials,
    locator: StorageLocator
  ): Promise<TokenExchangeResult> {
    return this.accessor.forceRenew(credentials, locator);
  }

  async describeTokens(locator: StorageLocator): Promise<TokenStatus> {
    return this.accessor.describe(locator);
  }

  /**
   * Authorization URL for the consent redirect; the state maps the
   * callback back to this user for ten minutes.
   */
  async beginLogin(user: ResolvedUserConfig): Promise<string> {
    if (!user.redirectUri) {
      throw new ConfigurationError('Configuration incomplete, missing: redirectUri', {
        userId: user.userId,
        missing: ['redirectUri'],
      });
    }

    const state = this.loginStates.create(user.userId);
    return this.renewer.createAuthorizeUrl(user.credentials, user.redirectUri, state);
  }

  /**
   * @throws {ValidationError} If the state is unknown or expired
   */
  async completeLogin(state: string, code: string): Promise<LoginCompletion> {
    const userId = state ? this.loginStates.consume(state) : null;
    if (!userId) {
      throw new ValidationError('Unknown or expired login state');
    }

    const user = await this.resolver.resolve(userId);
    const result = await this.exchangeCode(user.credentials, code, user.redirectUri, user.locator);

    if (result && this.configStore) {
      await this.configStore.update(userId, { validated: true });
    }
    return { userId, result };
  }

  /** Lifetime assumed when the authorization server omits expires_in */
  get defaultExpiresIn(): number {
    return this.config.renewal.defaultExpiresIn;
  }

  async getMetrics(): Promise<string> {
    return this.metrics.getMetrics();
  }

  async close(): Promise<void> {
    this.loginStates.destroy();
    await this.metrics.close();
    if (this.configStore) {
      await this.configStore.disconnect();
    }
  }

  private async seedDefaultUser(): Promise<void> {
    const defaults = this.config.defaultUser;
    if (!this.configStore || !defaults?.apiKey) return;

    const existing = await this.configStore.get(STATIC_USER_ID);
    if (existing) return;

    await this.configStore.update(STATIC_USER_ID, defaults);
    this.logger.info('Default user seeded from environment', { userId: STATIC_USER_ID });
  }
}
