// src/core/config/types.ts

import type { ClientCredentials, StorageLocator } from '../token/types';

export const DEFAULT_GIST_FILENAME = 'spotify_tokens.json';

export interface UserConfig {
  userId: string;
  clientId: string;
  clientSecret: string;
  gistId: string;
  githubToken: string;
  gistFilename: string;
  redirectUri: string;
  apiKey: string;
  validated: boolean;
  updatedAt: string; // ISO 8601
}

export type UserConfigPatch = Partial<Omit<UserConfig, 'userId' | 'updatedAt'>>;

/**
 * Everything the token core needs for one caller
 */
export interface ResolvedUserConfig {
  userId: string;
  credentials: ClientCredentials;
  locator: StorageLocator;
  redirectUri: string;
}

export interface ConfigurationResolver {
  /** Maps an API key to a user id; null when the key is unknown */
  authenticate(apiKey: string | undefined): Promise<string | null>;
  /** @throws {ConfigurationError} When required fields are missing */
  resolve(userId: string): Promise<ResolvedUserConfig>;
}

export interface UserConfigStoreConfig {
  backend: 'memory' | 'redis' | 'postgres';
  url?: string;
  encryption?: {
    key: string;
    previousKeys?: string[];
  };
}
