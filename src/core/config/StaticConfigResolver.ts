// src/core/config/StaticConfigResolver.ts

import * as crypto from 'crypto';
import type { ConfigurationResolver, ResolvedUserConfig, UserConfig } from './types';
import { DEFAULT_GIST_FILENAME } from './types';
import { toResolvedConfig } from './UserConfigStore';

export const STATIC_USER_ID = 'default';

export type StaticUserConfig = Omit<UserConfig, 'userId' | 'validated' | 'updatedAt'>;

/**
 * Single-tenant resolver backed by fixed values (usually the environment).
 * Without a configured API key every caller maps to the one user.
 */
export class StaticConfigResolver implements ConfigurationResolver {
  private config: UserConfig;

  constructor(values: StaticUserConfig) {
    this.config = {
      ...values,
      gistFilename: values.gistFilename || DEFAULT_GIST_FILENAME,
      userId: STATIC_USER_ID,
      validated: false,
      updatedAt: new Date().toISOString(),
    };
  }

  async authenticate(apiKey: string | undefined): Promise<string | null> {
    if (!this.config.apiKey) return STATIC_USER_ID;
    if (!apiKey) return null;

    const expected = Buffer.from(this.config.apiKey);
    const given = Buffer.from(apiKey);
    if (expected.length !== given.length) return null;
    return crypto.timingSafeEqual(expected, given) ? STATIC_USER_ID : null;
  }

  async resolve(userId: string): Promise<ResolvedUserConfig> {
    return toResolvedConfig({ ...this.config, userId });
  }
}
