// src/core/config/UserConfigStore.ts

import Keyv from 'keyv';
import KeyvRedis from '@keyv/redis';
import KeyvPostgres from '@keyv/postgres';
import { z } from 'zod';
import type {
  ConfigurationResolver,
  ResolvedUserConfig,
  UserConfig,
  UserConfigPatch,
  UserConfigStoreConfig,
} from './types';
import { DEFAULT_GIST_FILENAME } from './types';
import { SecretEncryption } from './SecretEncryption';
import type { Logger } from '../../observability/Logger';
import { ConfigurationError } from '../../utils/errors';

const EDITABLE_FIELDS = [
  'clientId',
  'clientSecret',
  'gistId',
  'githubToken',
  'gistFilename',
  'redirectUri',
  'apiKey',
  'validated',
] as const;

// Changing any of these invalidates a previous successful validation
const CREDENTIAL_FIELDS = ['clientId', 'clientSecret', 'gistId', 'githubToken', 'gistFilename'] as const;

const UserConfigSchema = z.object({
  userId: z.string(),
  clientId: z.string(),
  clientSecret: z.string(),
  gistId: z.string(),
  githubToken: z.string(),
  gistFilename: z.string(),
  redirectUri: z.string(),
  apiKey: z.string(),
  validated: z.boolean(),
  updatedAt: z.string(),
});

export function emptyUserConfig(userId: string): UserConfig {
  return {
    userId,
    clientId: '',
    clientSecret: '',
    gistId: '',
    githubToken: '',
    gistFilename: DEFAULT_GIST_FILENAME,
    redirectUri: '',
    apiKey: '',
    validated: false,
    updatedAt: new Date(0).toISOString(),
  };
}

/**
 * Turns a stored configuration into the core's credentials and locator.
 *
 * @throws {ConfigurationError} Naming every missing field
 */
export function toResolvedConfig(config: UserConfig): ResolvedUserConfig {
  const missing = (['clientId', 'clientSecret', 'gistId', 'githubToken'] as const).filter(
    (field) => !config[field]
  );
  if (missing.length > 0) {
    throw new ConfigurationError(`Configuration incomplete, missing: ${missing.join(', ')}`, {
      userId: config.userId,
      missing,
    });
  }

  return {
    userId: config.userId,
    credentials: { clientId: config.clientId, clientSecret: config.clientSecret },
    locator: {
      documentId: config.gistId,
      accessCredential: config.githubToken,
      slotName: config.gistFilename || DEFAULT_GIST_FILENAME,
    },
    redirectUri: config.redirectUri,
  };
}

/**
 * Per-user relay configuration on Keyv (memory, Redis or Postgres),
 * encrypted at rest when a key is configured.
 */
export class UserConfigStore implements ConfigurationResolver {
  private store: Keyv<string>;
  private encryption?: SecretEncryption;

  constructor(
    config: UserConfigStoreConfig,
    private logger: Logger
  ) {
    if (config.backend === 'redis' && config.url) {
      this.store = new Keyv<string>({ store: new KeyvRedis(config.url), namespace: 'relay' });
    } else if (config.backend === 'postgres' && config.url) {
      this.store = new Keyv<string>({
        store: new KeyvPostgres({ uri: config.url }),
        namespace: 'relay',
      });
    } else {
      this.store = new Keyv<string>({ namespace: 'relay' });
    }

    if (config.encryption) {
      this.encryption = new SecretEncryption(
        config.encryption.key,
        config.encryption.previousKeys
      );
    }

    this.store.on('error', (error: unknown) => {
      this.logger.error('User config store error', {
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }

  async get(userId: string): Promise<UserConfig | null> {
    const raw = await this.store.get(this.configKey(userId));
    if (!raw) return null;

    const parsed = UserConfigSchema.safeParse(JSON.parse(this.open(raw)));
    if (!parsed.success) {
      this.logger.error('Stored user config is malformed', { userId });
      return null;
    }
    return parsed.data;
  }

  /**
   * Apply allowed fields only; returns the stored result
   */
  async update(userId: string, patch: UserConfigPatch): Promise<UserConfig> {
    const existing = (await this.get(userId)) ?? emptyUserConfig(userId);
    const next: UserConfig = { ...existing };

    for (const field of EDITABLE_FIELDS) {
      const value = patch[field];
      if (value === undefined) continue;
      if (field === 'validated') {
        next.validated = Boolean(value);
      } else if (typeof value === 'string') {
        next[field] = value;
      }
    }

    const credentialsChanged = CREDENTIAL_FIELDS.some((field) => next[field] !== existing[field]);
    if (credentialsChanged && patch.validated === undefined) {
      next.validated = false;
    }
    next.updatedAt = new Date().toISOString();

    if (existing.apiKey && existing.apiKey !== next.apiKey) {
      await this.store.delete(this.apiKeyIndex(existing.apiKey));
    }
    if (next.apiKey) {
      await this.store.set(this.apiKeyIndex(next.apiKey), userId);
    }
    await this.store.set(this.configKey(userId), this.seal(JSON.stringify(next)));

    this.logger.info('User config updated', {
      userId,
      fields: Object.keys(patch).filter((key) => (EDITABLE_FIELDS as readonly string[]).includes(key)),
      validated: next.validated,
    });

    return next;
  }

  async findByApiKey(apiKey: string): Promise<UserConfig | null> {
    if (!apiKey) return null;
    const userId = await this.store.get(this.apiKeyIndex(apiKey));
    if (!userId) return null;

    const config = await this.get(userId);
    // Index entries can outlive a key change made by another process
    return config && config.apiKey === apiKey ? config : null;
  }

  async authenticate(apiKey: string | undefined): Promise<string | null> {
    if (!apiKey) return null;
    const config = await this.findByApiKey(apiKey);
    return config ? config.userId : null;
  }

  async resolve(userId: string): Promise<ResolvedUserConfig> {
    const config = await this.get(userId);
    if (!config) {
      throw new ConfigurationError('No configuration stored for user', { userId });
    }
    return toResolvedConfig(config);
  }

  async disconnect(): Promise<void> {
    await this.store.disconnect();
  }

  private configKey(userId: string): string {
    return `config:${userId}`;
  }

  private apiKeyIndex(apiKey: string): string {
    return `apikey:${apiKey}`;
  }

  private seal(plaintext: string): string {
    return this.encryption ? this.encryption.encrypt(plaintext) : plaintext;
  }

  private open(stored: string): string {
    return this.encryption ? this.encryption.decrypt(stored) : stored;
  }
}
