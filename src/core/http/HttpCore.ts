// src/core/http/HttpCore.ts

import axios, { AxiosInstance } from 'axios';
import * as http from 'http';
import * as https from 'https';
import type { HttpCoreConfig, HttpRequestConfig, HttpResponse } from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import { NetworkTimeoutError, NetworkError } from '../../utils/errors';
import { withHttpSpan, generateCorrelationId } from '../../observability/tracing';

export type HttpTarget = 'github' | 'spotify-api' | 'spotify-accounts' | 'other';

/**
 * Thin axios wrapper shared by the gist store and the upstream dispatcher.
 * Every HTTP status resolves; only transport failures reject.
 */
export class HttpCore {
  private axiosInstance: AxiosInstance;
  private metrics: MetricsCollector;
  private logger: Logger;

  constructor(config: HttpCoreConfig, metrics: MetricsCollector, logger: Logger) {
    this.metrics = metrics;
    this.logger = logger;

    const keepAlive = config.keepAlive ?? true;
    this.axiosInstance = axios.create({
      timeout: config.timeoutMs,
      httpAgent: new http.Agent({ keepAlive }),
      httpsAgent: new https.Agent({ keepAlive }),
    });
  }

  async get<T = unknown>(
    url: string,
    config: Omit<HttpRequestConfig, 'url' | 'method'> = {}
  ): Promise<HttpResponse<T>> {
    return this.request<T>({ ...config, url, method: 'GET' });
  }

  async patch<T = unknown>(
    url: string,
    body: unknown,
    config: Omit<HttpRequestConfig, 'url' | 'method' | 'body'> = {}
  ): Promise<HttpResponse<T>> {
    return this.request<T>({ ...config, url, method: 'PATCH', body });
  }

  async request<T = unknown>(config: HttpRequestConfig): Promise<HttpResponse<T>> {
    const target = this.extractTarget(config.url);
    const requestId = generateCorrelationId();
    const method = config.method ?? 'GET';

    this.logger.debug('HTTP request', {
      requestId,
      target,
      url: config.url,
      method,
      query: config.query,
      headerKeys: Object.keys(config.headers ?? {}),
    });

    const headers: Record<string, string> = {
      'X-Request-ID': requestId,
      'User-Agent': 'playback-relay/1.0',
      ...config.headers,
    };

    return withHttpSpan(method, config.url, async () => {
      const startTime = Date.now();

      try {
        const axiosResponse = await this.axiosInstance.request<T>({
          url: config.url,
          method,
          headers,
          params: config.query,
          data: config.body,
          timeout: config.timeout,
          validateStatus: () => true,
        });

        this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
          target,
          status: axiosResponse.status,
        });

        return {
          data: axiosResponse.data,
          status: axiosResponse.status,
          headers: this.toHeaderRecord(axiosResponse.headers),
        };
      } catch (error: unknown) {
        this.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
          target,
          status: 'error',
        });
        throw this.transformError(error, target, requestId);
      }
    });
  }

  private extractTarget(url: string): HttpTarget {
    if (url.includes('api.github.com')) return 'github';
    if (url.includes('accounts.spotify.com')) return 'spotify-accounts';
    if (url.includes('api.spotify.com')) return 'spotify-api';
    return 'other';
  }

  private toHeaderRecord(headers: object): Record<string, string> {
    const record: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      if (typeof value === 'string') {
        record[key.toLowerCase()] = value;
      }
    }
    return record;
  }

  private transformError(error: unknown, target: HttpTarget, requestId: string): Error {
    if (axios.isAxiosError(error)) {
      this.logger.warn('HTTP transport failure', {
        requestId,
        target,
        code: error.code,
        error: error.message,
      });

      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new NetworkTimeoutError('Request timeout', { target });
      }
      return new NetworkError('Network error', { target, code: error.code });
    }

    const message = error instanceof Error ? error.message : String(error);
    this.logger.warn('HTTP transport failure', { requestId, target, error: message });
    return new NetworkError('Network error', { target });
  }
}
