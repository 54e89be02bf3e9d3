// src/core/auth/LoginStateStore.ts

import type { Logger } from '../../observability/Logger';
import { generateCorrelationId } from '../../observability/tracing';

interface PendingLogin {
  userId: string;
  createdAt: number;
}

export interface LoginStateStoreConfig {
  ttlMs: number;
  cleanupIntervalMs: number;
}

/**
 * OAuth `state` values of consents in progress, mapped to the user that
 * started them. A state is single use; expired ones are swept periodically.
 */
export class LoginStateStore {
  private pending: Map<string, PendingLogin> = new Map();
  private cleanupInterval: NodeJS.Timeout;

  constructor(
    private config: LoginStateStoreConfig,
    private logger: Logger
  ) {
    this.cleanupInterval = setInterval(() => this.cleanupExpired(), config.cleanupIntervalMs);
    this.cleanupInterval.unref();
  }

  create(userId: string): string {
    const state = generateCorrelationId();
    this.pending.set(state, { userId, createdAt: Date.now() });
    return state;
  }

  /**
   * User id for the state, or null when unknown or expired. Removes the state.
   */
  consume(state: string): string | null {
    const login = this.pending.get(state);
    if (!login) return null;

    this.pending.delete(state);
    return this.isExpired(login, Date.now()) ? null : login.userId;
  }

  get size(): number {
    return this.pending.size;
  }

  destroy(): void {
    clearInterval(this.cleanupInterval);
    this.pending.clear();
  }

  private cleanupExpired(): void {
    const now = Date.now();
    for (const [state, login] of this.pending.entries()) {
      if (this.isExpired(login, now)) {
        this.pending.delete(state);
        this.logger.debug('Cleaned up expired login state', { userId: login.userId });
      }
    }
  }

  private isExpired(login: PendingLogin, now: number): boolean {
    return now - login.createdAt > this.config.ttlMs;
  }
}
