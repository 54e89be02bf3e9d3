// src/core/token/TokenAccessor.ts

import type { GistTokenStore } from './GistTokenStore';
import type { RenewalLock } from './RenewalLock';
import type { TokenRenewer } from '../auth/TokenRenewer';
import type {
  ClientCredentials,
  StorageLocator,
  TokenExchangeResult,
  TokenRecord,
  TokenStatus,
} from './types';
import { locatorKey, nowSeconds } from './types';
import type { Logger } from '../../observability/Logger';
import { previewSecret } from '../../observability/Logger';
import {
  MissingAccessTokenError,
  MissingRefreshTokenError,
  RenewalFailedError,
  ValidationError,
} from '../../utils/errors';

export const GRACE_SECONDS = 300;

export interface TokenAccessorConfig {
  graceSeconds: number;
  defaultExpiresIn: number;
}

/**
 * Renewal is due once `now` is inside the grace window before expiry.
 */
export function needsRenewal(expiresAt: number, now: number, graceSeconds = GRACE_SECONDS): boolean {
  return now >= expiresAt - graceSeconds;
}

export class TokenAccessor {
  constructor(
    private config: TokenAccessorConfig,
    private store: GistTokenStore,
    private renewer: TokenRenewer,
    private lock: RenewalLock,
    private logger: Logger
  ) {}

  /**
   * Access token usable for at least the grace window, renewing first if needed.
   *
   * @throws {MissingAccessTokenError} Nothing stored yet, login or init required
   * @throws {MissingRefreshTokenError} Stored record has no refresh token
   * @throws {RenewalFailedError} Authorization server rejected the refresh
   */
  async getValidToken(credentials: ClientCredentials, locator: StorageLocator): Promise<string> {
    return this.lock.runExclusive(locatorKey(locator), async () => {
      const record = await this.store.load(locator);
      this.assertUsable(record, locator);

      const now = nowSeconds();
      if (!needsRenewal(record.expires_at, now, this.config.graceSeconds)) {
        return record.access_token;
      }

      this.logger.info('Access token near expiry, renewing', {
        documentId: locator.documentId,
        expiresInSeconds: Math.floor(record.expires_at - now),
      });

      const result = await this.renewer.renew(credentials, record.refresh_token, locator);
      if (!result) {
        throw new RenewalFailedError(undefined, { documentId: locator.documentId });
      }

      return result.access_token;
    });
  }

  /**
   * Renew regardless of the stored expiry
   */
  async forceRenew(
    credentials: ClientCredentials,
    locator: StorageLocator
  ): Promise<TokenExchangeResult> {
    return this.lock.runExclusive(locatorKey(locator), async () => {
      const record = await this.store.load(locator);
      if (!record.refresh_token) {
        throw new MissingRefreshTokenError(undefined, { documentId: locator.documentId });
      }

      this.logger.info('Forcing token renewal', { documentId: locator.documentId });

      const result = await this.renewer.renew(credentials, record.refresh_token, locator);
      if (!result) {
        throw new RenewalFailedError(undefined, { documentId: locator.documentId });
      }
      return result;
    });
  }

  /**
   * Seed a fresh record with the default lifetime
   */
  async initialize(
    locator: StorageLocator,
    accessToken: string,
    refreshToken: string
  ): Promise<boolean> {
    if (!accessToken || !refreshToken) {
      throw new ValidationError('Both access_token and refresh_token required');
    }

    return this.lock.runExclusive(locatorKey(locator), () =>
      this.store.save(locator, {
        access_token: accessToken,
        refresh_token: refreshToken,
        expires_at: nowSeconds() + this.config.defaultExpiresIn,
      })
    );
  }

  async describe(locator: StorageLocator): Promise<TokenStatus> {
    const record = await this.store.load(locator);
    const now = nowSeconds();
    const expiresInSeconds = Math.trunc(record.expires_at - now);

    return {
      accessTokenPreview: previewSecret(record.access_token),
      hasRefreshToken: Boolean(record.refresh_token),
      expiresAt: record.expires_at,
      expiresInSeconds,
      isExpired: expiresInSeconds <= 0,
      timestamp: now,
    };
  }

  private assertUsable(record: TokenRecord, locator: StorageLocator): void {
    if (!record.access_token) {
      throw new MissingAccessTokenError(undefined, { documentId: locator.documentId });
    }
    if (!record.refresh_token) {
      throw new MissingRefreshTokenError(undefined, { documentId: locator.documentId });
    }
  }
}
