// src/core/http/types.ts

import type { ClientCredentials, StorageLocator } from '../token/types';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

export interface HttpRequestConfig {
  url: string;
  method?: HttpMethod;
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean>;
  body?: unknown;
  timeout?: number;
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
}

export interface DispatchResponse<T = unknown> extends HttpResponse<T> {
  /** Token for follow-up calls; the renewed one once a 401 forced a renewal */
  accessToken: string;
}

export interface HttpCoreConfig {
  timeoutMs: number;
  keepAlive?: boolean;
}

export interface DispatchRequest {
  method: HttpMethod;
  path: string;
  accessToken: string;
  locator: StorageLocator;
  credentials: ClientCredentials;
  body?: unknown;
  query?: Record<string, string | number | boolean>;
}
