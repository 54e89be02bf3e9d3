// src/core/http/UpstreamDispatcher.ts

import type { HttpCore } from './HttpCore';
import type { DispatchRequest, DispatchResponse, HttpResponse } from './types';
import type { TokenAccessor } from '../token/TokenAccessor';
import type { TokenExchangeResult } from '../token/types';
import { truncateBody } from '../token/GistTokenStore';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { UpstreamError, isRelayError } from '../../utils/errors';
import { addSpanEvent } from '../../observability/tracing';

export interface UpstreamDispatcherConfig {
  baseUrl: string; // e.g. https://api.spotify.com/v1
}

/**
 * Bearer-authenticated calls to the playback API with one retry on 401.
 *
 * A 401 forces a renewal whatever the stored expiry says. The request is
 * replayed once with the new token; if renewal fails, or the replay is also
 * rejected, the original 401 is returned. No other status is retried.
 * Every response carries the token later calls of the same command should use.
 */
export class UpstreamDispatcher {
  constructor(
    private config: UpstreamDispatcherConfig,
    private http: HttpCore,
    private accessor: TokenAccessor,
    private metrics: MetricsCollector,
    private logger: Logger
  ) {}

  async dispatch<T = unknown>(request: DispatchRequest): Promise<DispatchResponse<T>> {
    const response = await this.send<T>(request, request.accessToken);

    if (response.status !== 401) {
      this.countRequest(request, response.status);
      return { ...response, accessToken: request.accessToken };
    }

    this.logger.info('Upstream returned 401, renewing and retrying once', {
      method: request.method,
      path: request.path,
    });

    const renewed = await this.tryForceRenew(request);
    if (!renewed) {
      this.recordRetry('renewal_failed');
      this.countRequest(request, response.status);
      return { ...response, accessToken: request.accessToken };
    }

    const retried = await this.send<T>(request, renewed.access_token);
    if (retried.status === 401) {
      this.recordRetry('still_unauthorized');
      this.countRequest(request, response.status);
      return { ...response, accessToken: renewed.access_token };
    }

    this.recordRetry('replayed');
    this.countRequest(request, retried.status);
    return { ...retried, accessToken: renewed.access_token };
  }

  /**
   * Turn a non-2xx response into an UpstreamError with a sanitized message.
   * The upstream body is only logged.
   */
  expectSuccess<R extends HttpResponse<unknown>>(response: R, action: string): R {
    if (response.status >= 200 && response.status < 300) {
      return response;
    }

    this.logger.error('Upstream request failed', {
      action,
      status: response.status,
      body: truncateBody(response.data),
    });

    throw new UpstreamError(`Playback API request failed: ${action}`, response.status, {
      action,
    });
  }

  private async send<T>(request: DispatchRequest, accessToken: string): Promise<HttpResponse<T>> {
    return this.http.request<T>({
      url: `${this.config.baseUrl}${request.path}`,
      method: request.method,
      headers: {
        Authorization: `Bearer ${accessToken}`,
        ...(request.body === undefined ? {} : { 'Content-Type': 'application/json' }),
      },
      query: request.query,
      body: request.body,
    });
  }

  private async tryForceRenew(request: DispatchRequest): Promise<TokenExchangeResult | null> {
    try {
      return await this.accessor.forceRenew(request.credentials, request.locator);
    } catch (error: unknown) {
      if (!isRelayError(error)) throw error;

      this.logger.warn('Renewal after 401 failed, returning original response', {
        code: error.code,
        path: request.path,
      });
      return null;
    }
  }

  private recordRetry(outcome: 'replayed' | 'renewal_failed' | 'still_unauthorized'): void {
    this.metrics.incrementCounter('upstream_retries_total', { outcome });
    addSpanEvent('upstream.retry', { outcome });
  }

  private countRequest(request: DispatchRequest, status: number): void {
    this.metrics.incrementCounter('upstream_requests_total', {
      method: request.method,
      status,
    });
  }
}
