// src/core/auth/TokenRenewer.ts

import { Issuer, BaseClient } from 'openid-client';
import { z } from 'zod';
import type { AuthServerConfig } from './types';
import type {
  ClientCredentials,
  StorageLocator,
  TokenExchangeResult,
  TokenRecord,
} from '../token/types';
import { nowSeconds } from '../token/types';
import type { GistTokenStore } from '../token/GistTokenStore';
import { truncateBody } from '../token/GistTokenStore';
import type { HttpCore } from '../http/HttpCore';
import type { HttpResponse } from '../http/types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { withRenewalSpan } from '../../observability/tracing';
import { isRelayError } from '../../utils/errors';

type GrantType = 'refresh_token' | 'authorization_code';

const TokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    refresh_token: z.string().optional(),
    expires_in: z.number().optional(),
    scope: z.string().optional(),
    token_type: z.string().optional(),
  })
  .passthrough();

const OAuthErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

/**
 * `Basic base64(client_id:client_secret)` over the literal pair
 */
export function basicAuthorization(credentials: ClientCredentials): string {
  const pair = `${credentials.clientId}:${credentials.clientSecret}`;
  return `Basic ${Buffer.from(pair, 'utf8').toString('base64')}`;
}

/**
 * Token exchanges with the authorization server.
 *
 * Both grants are form POSTs with Basic client authentication and persist the
 * resulting pair through the gist store. Failures, timeouts included, are
 * logged and returned as null, never retried here.
 */
export class TokenRenewer {
  private issuer: Issuer;

  constructor(
    private config: AuthServerConfig,
    private http: HttpCore,
    private store: GistTokenStore,
    private metrics: MetricsCollector,
    private logger: Logger
  ) {
    this.issuer = new Issuer({
      issuer: config.issuer,
      authorization_endpoint: config.authorizeEndpoint,
      token_endpoint: config.tokenEndpoint,
    });
  }

  /**
   * Exchange a refresh token for a new access token.
   * A response without refresh_token keeps the old one.
   */
  async renew(
    credentials: ClientCredentials,
    refreshToken: string,
    locator: StorageLocator
  ): Promise<TokenExchangeResult | null> {
    return withRenewalSpan('refresh_token', async () => {
      const result = await this.exchange('refresh_token', credentials, {
        grant_type: 'refresh_token',
        refresh_token: refreshToken,
      });
      if (!result) return null;

      await this.persist(locator, {
        access_token: result.access_token,
        refresh_token: result.refresh_token ?? refreshToken,
        expires_at: nowSeconds() + (result.expires_in ?? this.config.defaultExpiresIn),
      });

      return result;
    });
  }

  /**
   * Initial authorization_code exchange
   */
  async exchangeCode(
    credentials: ClientCredentials,
    code: string,
    redirectUri: string,
    locator: StorageLocator
  ): Promise<TokenExchangeResult | null> {
    return withRenewalSpan('authorization_code', async () => {
      const result = await this.exchange('authorization_code', credentials, {
        grant_type: 'authorization_code',
        code,
        redirect_uri: redirectUri,
      });
      if (!result) return null;

      if (!result.refresh_token) {
        this.logger.error('Authorization code exchange returned no refresh token');
        return null;
      }

      await this.persist(locator, {
        access_token: result.access_token,
        refresh_token: result.refresh_token,
        expires_at: nowSeconds() + (result.expires_in ?? this.config.defaultExpiresIn),
      });

      return result;
    });
  }

  createAuthorizeUrl(
    credentials: ClientCredentials,
    redirectUri: string,
    state: string,
    scopes: string[] = this.config.scopes
  ): string {
    return this.createClient(credentials, redirectUri).authorizationUrl({
      scope: scopes.join(' '),
      state,
      redirect_uri: redirectUri,
    });
  }

  private async exchange(
    grant: GrantType,
    credentials: ClientCredentials,
    form: Record<string, string>
  ): Promise<TokenExchangeResult | null> {
    const startTime = Date.now();

    let response: HttpResponse<unknown>;
    try {
      response = await this.http.request<unknown>({
        url: this.config.tokenEndpoint,
        method: 'POST',
        headers: {
          Authorization: basicAuthorization(credentials),
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: new URLSearchParams(form).toString(),
        timeout: this.config.timeoutMs,
      });
    } catch (error: unknown) {
      if (!isRelayError(error)) throw error;

      this.logger.error('Token exchange failed', { grant, code: error.code, error: error.message });
      this.record(grant, 'failed', startTime);
      return null;
    }

    if (response.status !== 200) {
      this.logger.error('Token exchange failed', {
        grant,
        status: response.status,
        ...describeErrorBody(response.data),
      });
      this.record(grant, 'failed', startTime);
      return null;
    }

    const parsed = TokenResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      this.logger.error('Token exchange response has no access token', { grant });
      this.record(grant, 'failed', startTime);
      return null;
    }

    const result: TokenExchangeResult = {
      access_token: parsed.data.access_token,
      refresh_token: parsed.data.refresh_token || undefined,
      expires_in: parsed.data.expires_in,
      scope: parsed.data.scope,
      token_type: parsed.data.token_type,
    };

    this.logger.debug('Token exchange successful', {
      grant,
      hasRefreshToken: Boolean(result.refresh_token),
      expiresIn: result.expires_in,
      tokenType: result.token_type,
    });
    this.record(grant, 'success', startTime);
    return result;
  }

  private async persist(locator: StorageLocator, record: TokenRecord): Promise<void> {
    const saved = await this.store.save(locator, record);
    if (!saved) {
      // The caller still gets a usable token; the next request renews again.
      this.logger.warn('Renewed token pair was not persisted', {
        documentId: locator.documentId,
        slotName: locator.slotName,
      });
    }
  }

  private createClient(credentials: ClientCredentials, redirectUri: string): BaseClient {
    return new this.issuer.Client({
      client_id: credentials.clientId,
      redirect_uris: [redirectUri],
      response_types: ['code'],
      token_endpoint_auth_method: 'client_secret_basic',
    });
  }

  private record(grant: GrantType, status: 'success' | 'failed', startTime: number): void {
    this.metrics.recordLatency('token_renewal_duration', Date.now() - startTime, {
      grant,
      status,
    });
    this.metrics.incrementCounter('token_renewal_total', { grant, status });
  }
}

function describeErrorBody(data: unknown): Record<string, unknown> {
  const body = OAuthErrorSchema.safeParse(data);
  if (body.success) {
    return {
      error: body.data.error,
      description: body.data.error_description
        ? truncateBody(body.data.error_description)
        : undefined,
    };
  }
  return { body: truncateBody(data) };
}
