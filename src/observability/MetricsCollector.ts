// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram } from 'prom-client';
import * as http from 'http';
import type { Logger } from './Logger';

export interface MetricsConfig {
  enabled?: boolean;
  port?: number;
  path?: string;
}

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private server?: http.Server;
  private logger?: Logger;

  constructor(config: MetricsConfig = {}, logger?: Logger) {
    this.logger = logger;
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();

      if (config.port) {
        this.exposeMetrics(config.port, config.path ?? '/metrics');
      }
    }
  }

  private initializeMetrics(): void {
    // HTTP metrics
    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: 'http_request_duration_seconds',
        help: 'Outgoing HTTP request duration',
        labelNames: ['target', 'status'],
        buckets: [0.1, 0.5, 1, 2, 5, 10],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'upstream_requests_total',
      new Counter({
        name: 'upstream_requests_total',
        help: 'Playback API requests by final status',
        labelNames: ['method', 'status'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'upstream_retries_total',
      new Counter({
        name: 'upstream_retries_total',
        help: 'One-shot retries after a 401 from the playback API',
        labelNames: ['outcome'],
        registers: [this.registry],
      })
    );

    // Token metrics
    this.counters.set(
      'token_store_operations_total',
      new Counter({
        name: 'token_store_operations_total',
        help: 'Gist token document loads and saves',
        labelNames: ['operation', 'status'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'token_renewal_total',
      new Counter({
        name: 'token_renewal_total',
        help: 'Token exchanges with the authorization server',
        labelNames: ['grant', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'token_renewal_duration',
      new Histogram({
        name: 'token_renewal_duration_seconds',
        help: 'Token exchange duration',
        labelNames: ['grant', 'status'],
        buckets: [0.1, 0.3, 0.5, 1, 2, 5],
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Record<string, string | number>): void {
    const counter = this.counters.get(name);
    counter?.inc(labels);
  }

  recordLatency(name: string, durationMs: number, labels: Record<string, string | number>): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  private exposeMetrics(port: number, path: string): void {
    this.server = http.createServer((req, res) => {
      if (req.url !== path) {
        res.statusCode = 404;
        res.end('Not Found');
        return;
      }

      this.getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', this.registry.contentType);
          res.end(body);
        })
        .catch((error: unknown) => {
          this.logger?.error('Metrics rendering failed', {
            error: error instanceof Error ? error.message : String(error),
          });
          res.statusCode = 500;
          res.end();
        });
    });

    this.server.on('error', (error: NodeJS.ErrnoException) => {
      this.logger?.error('MetricsCollector server error', { error: error.message, code: error.code });
    });

    this.server.listen(port, () => {
      this.logger?.info(`Metrics exposed on http://localhost:${port}${path}`);
    });
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;

    return new Promise((resolve) => {
      server.close(() => resolve());
    });
  }
}
