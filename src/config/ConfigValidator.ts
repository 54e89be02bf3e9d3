// src/config/ConfigValidator.ts

import { z } from 'zod';

// Per-user configuration store schema
const ConfigStoreSchema = z
  .object({
    backend: z.enum(['memory', 'redis', 'postgres'], {
      errorMap: () => ({ message: "Config store backend must be 'memory', 'redis', or 'postgres'" }),
    }),
    url: z.string().url().optional(),
    encryption: z
      .object({
        key: z
          .string()
          .length(64, 'Encryption key must be exactly 64 characters')
          .regex(
            /^[0-9a-f]{64}$/i,
            'Encryption key must be a valid 32-byte hexadecimal string (0-9, a-f)'
          ),
        previousKeys: z.array(z.string().regex(/^[0-9a-f]{64}$/i)).optional(),
      })
      .optional(),
  })
  .refine((data) => data.backend === 'memory' || Boolean(data.url), {
    message: "Redis and Postgres backends require 'url' configuration",
  });

const AuthSchema = z.object({
  issuer: z.string().url().default('https://accounts.spotify.com'),
  authorizeEndpoint: z.string().url().default('https://accounts.spotify.com/authorize'),
  tokenEndpoint: z.string().url().default('https://accounts.spotify.com/api/token'),
  scopes: z.array(z.string().min(1)).optional(),
});

const RenewalSchema = z.object({
  graceSeconds: z.number().int().min(0).max(3600).default(300),
  defaultExpiresIn: z.number().int().positive().default(3600),
});

// Single-tenant fallback, used when no per-user store is involved
const DefaultUserSchema = z.object({
  clientId: z.string().default(''),
  clientSecret: z.string().default(''),
  gistId: z.string().default(''),
  githubToken: z.string().default(''),
  gistFilename: z.string().min(1).default('spotify_tokens.json'),
  redirectUri: z.string().default(''),
  apiKey: z.string().default(''),
});

const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
    silent: z.boolean().optional(),
  })
  .optional();

const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    port: z.number().int().min(1024).max(65535).optional(),
    path: z.string().startsWith('/').optional(),
  })
  .optional();

export const RelayConfigSchema = z.object({
  http: z
    .object({
      timeoutMs: z.number().positive().default(10000),
      keepAlive: z.boolean().optional(),
    })
    .default({}),
  auth: AuthSchema.default({}),
  upstream: z
    .object({ baseUrl: z.string().url().default('https://api.spotify.com/v1') })
    .default({}),
  store: z.object({ baseUrl: z.string().url().default('https://api.github.com') }).default({}),
  renewal: RenewalSchema.default({}),
  configStore: ConfigStoreSchema.optional(),
  defaultUser: DefaultUserSchema.optional(),
  logging: LoggerConfigSchema,
  metrics: MetricsConfigSchema,
});

export type RelayConfigInput = z.input<typeof RelayConfigSchema>;
export type RelayConfig = z.output<typeof RelayConfigSchema>;
export type DefaultUserConfig = z.output<typeof DefaultUserSchema>;

/**
 * Validate relay configuration and fill defaults
 *
 * @throws {z.ZodError} If configuration is invalid
 */
export function validateConfig(config: unknown): RelayConfig {
  return RelayConfigSchema.parse(config);
}

export type SafeValidation =
  | { success: true; data: RelayConfig }
  | { success: false; errors: string[] };

/**
 * Validate configuration and return readable errors
 */
export function validateConfigSafe(config: unknown): SafeValidation {
  const result = RelayConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}
