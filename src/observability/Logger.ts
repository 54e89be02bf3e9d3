// src/observability/Logger.ts

import winston from 'winston';

export interface LoggerConfig {
  level?: 'debug' | 'info' | 'warn' | 'error';
  format?: 'json' | 'pretty';
  silent?: boolean;
}

const SENSITIVE_KEYS = [
  'accessToken',
  'refreshToken',
  'access_token',
  'refresh_token',
  'clientSecret',
  'client_secret',
  'githubToken',
  'accessCredential',
  'apiKey',
];

const NESTED_KEYS = ['record', 'tokenSet', 'credentials', 'locator'];

/**
 * Truncated preview of a secret, safe for debug payloads.
 */
export function previewSecret(value: string, length = 20): string | null {
  if (!value) return null;
  return `${value.substring(0, length)}...`;
}

export class Logger {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'pretty'
        ? winston.format.combine(winston.format.colorize(), winston.format.simple())
        : winston.format.json();

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      silent: config.silent ?? false,
      transports: [new winston.transports.Console()],
    });
  }

  private redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
    const redacted = this.redactKeys(obj);

    for (const key of NESTED_KEYS) {
      const nested = redacted[key];
      if (nested && typeof nested === 'object' && !Array.isArray(nested)) {
        redacted[key] = this.redactKeys(nested as Record<string, unknown>);
      }
    }

    return redacted;
  }

  private redactKeys(obj: Record<string, unknown>): Record<string, unknown> {
    const copy = { ...obj };
    for (const key of SENSITIVE_KEYS) {
      if (key in copy) copy[key] = '[REDACTED]';
    }
    return copy;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta ? this.redactSensitive(meta) : {});
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta ? this.redactSensitive(meta) : {});
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta ? this.redactSensitive(meta) : {});
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta ? this.redactSensitive(meta) : {});
  }
}
