// src/core/token/types.ts

import type { StoreUnavailableError } from '../../utils/errors';

/**
 * Token document as stored in the gist slot. Field names are the wire format.
 */
export interface TokenRecord {
  access_token: string;
  refresh_token: string;
  expires_at: number; // Unix seconds, float allowed
}

export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
}

/**
 * Where a TokenRecord lives: gist id, GitHub token, file name in the gist.
 */
export interface StorageLocator {
  documentId: string;
  accessCredential: string;
  slotName: string;
}

/**
 * Parsed authorization-server response for a token exchange
 */
export interface TokenExchangeResult {
  access_token: string;
  refresh_token?: string;
  expires_in?: number;
  scope?: string;
  token_type?: string;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type LoadResult = Result<TokenRecord, StoreUnavailableError>;

export interface TokenStatus {
  accessTokenPreview: string | null;
  hasRefreshToken: boolean;
  expiresAt: number;
  expiresInSeconds: number;
  isExpired: boolean;
  timestamp: number;
}

export function emptyTokenRecord(): TokenRecord {
  return { access_token: '', refresh_token: '', expires_at: 0 };
}

export function nowSeconds(): number {
  return Date.now() / 1000;
}

export function locatorKey(locator: StorageLocator): string {
  return `${locator.documentId}:${locator.slotName}`;
}
