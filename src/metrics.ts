/**
 * Prometheus metrics for outgoing API calls
 *
 * Tracks:
 * - API calls (operation, method, status class)
 * - Call duration
 * - Failures by error code
 */

import { Registry, Counter, Histogram } from 'prom-client';

export interface MetricsCollectorConfig {
  enabled: boolean;
  prefix?: string;
  /** Register into an existing registry instead of a private one */
  registry?: Registry;
}

/** Label used for calls that bypass the operation catalog */
export const RAW_REQUEST_LABEL = '(raw)';

export class MetricsCollector {
  private registry: Registry;
  private enabled: boolean;

  private apiCallsTotal: Counter;
  private apiCallDuration: Histogram;
  private apiCallErrors: Counter;

  constructor(config: MetricsCollectorConfig) {
    this.enabled = config.enabled;
    this.registry = config.registry ?? new Registry();

    const prefix = config.prefix || 'iri_client_';

    this.apiCallsTotal = new Counter({
      name: `${prefix}api_calls_total`,
      help: 'Total number of API calls that received a response',
      labelNames: ['operation', 'method', 'status'],
      registers: [this.registry],
    });

    this.apiCallDuration = new Histogram({
      name: `${prefix}api_call_duration_seconds`,
      help: 'API call duration in seconds, response received',
      labelNames: ['operation', 'method', 'status'],
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 10],
      registers: [this.registry],
    });

    this.apiCallErrors = new Counter({
      name: `${prefix}api_call_errors_total`,
      help: 'Total number of failed API calls',
      labelNames: ['operation', 'error_type'],
      registers: [this.registry],
    });
  }

  /**
   * Record a call that got a response (any status)
   */
  recordApiCall(operation: string, method: string, status: number, durationSeconds: number): void {
    if (!this.enabled) return;

    const labels = { operation, method, status: this.getStatusLabel(status) };
    this.apiCallsTotal.inc(labels);
    this.apiCallDuration.observe(labels, durationSeconds);
  }

  /**
   * Record a failed call; `errorType` is the ClientError code
   */
  recordApiCallError(operation: string, errorType: string): void {
    if (!this.enabled) return;
    this.apiCallErrors.inc({ operation, error_type: errorType });
  }

  /**
   * Get metrics in Prometheus format
   */
  async getMetrics(): Promise<string> {
    if (!this.enabled) {
      return '# Metrics disabled\n';
    }
    return this.registry.metrics();
  }

  getRegistry(): Registry {
    return this.registry;
  }

  /**
   * Group statuses by class to keep label cardinality low
   */
  private getStatusLabel(status: number): string {
    if (status >= 200 && status < 300) return '2xx';
    if (status >= 300 && status < 400) return '3xx';
    if (status >= 400 && status < 500) return '4xx';
    if (status >= 500 && status < 600) return '5xx';
    return 'unknown';
  }
}
