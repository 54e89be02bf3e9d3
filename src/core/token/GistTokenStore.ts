// src/core/token/GistTokenStore.ts

import { z } from 'zod';
import type { HttpCore } from '../http/HttpCore';
import type { HttpResponse } from '../http/types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { LoadResult, StorageLocator, TokenRecord } from './types';
import { emptyTokenRecord } from './types';
import { StoreUnavailableError } from '../../utils/errors';
import { withTokenSpan } from '../../observability/tracing';

const ERROR_BODY_PREVIEW = 200;

const GistResponseSchema = z.object({
  files: z.record(z.object({ content: z.string() }).passthrough().nullable()),
});

export const TokenRecordSchema = z.object({
  access_token: z.string().default(''),
  refresh_token: z.string().default(''),
  expires_at: z.number().default(0),
});

export interface GistTokenStoreConfig {
  baseUrl: string; // e.g. https://api.github.com
}

/**
 * Durable token storage in a named file of a GitHub Gist.
 *
 * Reads never throw: every failure collapses to the zero record (or a
 * StoreUnavailableError in the Result form). Writes report success as a boolean.
 * Last write wins; there is no conditional update.
 */
export class GistTokenStore {
  constructor(
    private config: GistTokenStoreConfig,
    private http: HttpCore,
    private metrics: MetricsCollector,
    private logger: Logger
  ) {}

  async load(locator: StorageLocator): Promise<TokenRecord> {
    const result = await this.loadResult(locator);
    return result.ok ? result.value : emptyTokenRecord();
  }

  async loadResult(locator: StorageLocator): Promise<LoadResult> {
    return withTokenSpan('load', locator.documentId, async () => {
      const result = await this.fetchRecord(locator);
      this.metrics.incrementCounter('token_store_operations_total', {
        operation: 'load',
        status: result.ok ? 'success' : 'failure',
      });
      if (!result.ok) {
        this.logger.warn('Token document load failed', {
          documentId: locator.documentId,
          slotName: locator.slotName,
          reason: result.error.message,
          ...result.error.details,
        });
      }
      return result;
    });
  }

  async save(locator: StorageLocator, record: TokenRecord): Promise<boolean> {
    return withTokenSpan('save', locator.documentId, async () => {
      const saved = await this.writeRecord(locator, record);
      this.metrics.incrementCounter('token_store_operations_total', {
        operation: 'save',
        status: saved ? 'success' : 'failure',
      });
      return saved;
    });
  }

  private async fetchRecord(locator: StorageLocator): Promise<LoadResult> {
    if (!locator.documentId || !locator.accessCredential) {
      return this.failure('Storage locator is not configured');
    }

    let response: HttpResponse<unknown>;
    try {
      response = await this.http.get<unknown>(this.documentUrl(locator), {
        headers: this.headers(locator),
      });
    } catch (error: unknown) {
      return this.failure('Token document unreachable', {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    if (response.status !== 200) {
      return this.failure('Token document request rejected', {
        status: response.status,
        body: truncateBody(response.data),
      });
    }

    const gist = GistResponseSchema.safeParse(response.data);
    if (!gist.success) {
      return this.failure('Unexpected gist response shape');
    }

    const file = gist.data.files[locator.slotName];
    if (!file) {
      return this.failure('Token slot not found in document');
    }

    let content: unknown;
    try {
      content = JSON.parse(file.content);
    } catch {
      return this.failure('Token slot content is not valid JSON');
    }

    const record = TokenRecordSchema.safeParse(content);
    if (!record.success) {
      return this.failure('Token slot content has an invalid shape', {
        issues: record.error.issues.map((issue) => issue.path.join('.')),
      });
    }

    return { ok: true, value: record.data };
  }

  private async writeRecord(locator: StorageLocator, record: TokenRecord): Promise<boolean> {
    if (!locator.documentId || !locator.accessCredential) {
      this.logger.warn('Token document save skipped, storage locator is not configured', {
        slotName: locator.slotName,
      });
      return false;
    }

    const payload = {
      files: {
        [locator.slotName]: {
          content: JSON.stringify(
            {
              access_token: record.access_token,
              refresh_token: record.refresh_token,
              expires_at: record.expires_at,
            },
            null,
            2
          ),
        },
      },
    };

    try {
      const response = await this.http.patch<unknown>(this.documentUrl(locator), payload, {
        headers: {
          ...this.headers(locator),
          'Content-Type': 'application/json',
        },
      });

      this.logger.debug('Token document save status', {
        documentId: locator.documentId,
        status: response.status,
      });

      if (response.status !== 200) {
        this.logger.error('Token document save rejected', {
          documentId: locator.documentId,
          status: response.status,
          body: truncateBody(response.data),
        });
        return false;
      }

      this.logger.info('Token document saved', {
        documentId: locator.documentId,
        slotName: locator.slotName,
        expiresAt: record.expires_at,
      });
      return true;
    } catch (error: unknown) {
      this.logger.error('Token document save failed', {
        documentId: locator.documentId,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  private failure(message: string, details?: Record<string, unknown>): LoadResult {
    return { ok: false, error: new StoreUnavailableError(message, details) };
  }

  private documentUrl(locator: StorageLocator): string {
    return `${this.config.baseUrl}/gists/${encodeURIComponent(locator.documentId)}`;
  }

  private headers(locator: StorageLocator): Record<string, string> {
    return {
      Authorization: `token ${locator.accessCredential}`,
      Accept: 'application/vnd.github+json',
    };
  }
}

export function truncateBody(data: unknown, length = ERROR_BODY_PREVIEW): string {
  const text = typeof data === 'string' ? data : JSON.stringify(data) ?? '';
  return text.substring(0, length);
}
