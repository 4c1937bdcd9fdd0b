/**
 * Tests for MetricsCollector
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Registry } from 'prom-client';
import { MetricsCollector } from './metrics.js';

describe('MetricsCollector', () => {
  let metrics: MetricsCollector;

  beforeEach(() => {
    metrics = new MetricsCollector({ enabled: true, prefix: 'test_' });
  });

  describe('API Call Metrics', () => {
    it('should record API calls', async () => {
      metrics.recordApiCall('getSite', 'GET', 200, 0.2);
      metrics.recordApiCall('launchJob', 'POST', 201, 0.3);

      const output = await metrics.getMetrics();

      expect(output).toContain('test_api_calls_total');
      expect(output).toContain('operation="getSite"');
      expect(output).toContain('method="POST"');
      expect(output).toContain('status="2xx"');
    });

    it('should record API call duration', async () => {
      metrics.recordApiCall('getSite', 'GET', 200, 0.5);

      const output = await metrics.getMetrics();

      expect(output).toContain('test_api_call_duration_seconds_bucket');
    });

    it('should record API call errors by code', async () => {
      metrics.recordApiCallError('getSite', 'REQUEST_FAILED');
      metrics.recordApiCallError('getSite', 'HTTP_STATUS');

      const output = await metrics.getMetrics();

      expect(output).toContain('test_api_call_errors_total');
      expect(output).toContain('error_type="REQUEST_FAILED"');
      expect(output).toContain('error_type="HTTP_STATUS"');
    });

    it('should group status codes (2xx, 4xx, 5xx)', async () => {
      metrics.recordApiCall('operation1', 'GET', 200, 0.1);
      metrics.recordApiCall('operation2', 'GET', 404, 0.1);
      metrics.recordApiCall('operation3', 'GET', 503, 0.1);

      const output = await metrics.getMetrics();

      expect(output).toContain('status="2xx"');
      expect(output).toContain('status="4xx"');
      expect(output).toContain('status="5xx"');
      expect(output).not.toContain('status="404"');
    });
  });

  describe('Disabled Metrics', () => {
    it('should not record metrics when disabled', async () => {
      const disabledMetrics = new MetricsCollector({ enabled: false });

      disabledMetrics.recordApiCall('getSite', 'GET', 200, 0.1);
      disabledMetrics.recordApiCallError('getSite', 'HTTP_STATUS');

      const output = await disabledMetrics.getMetrics();

      expect(output).toBe('# Metrics disabled\n');
    });
  });

  describe('Custom Prefix', () => {
    it('should use custom prefix', async () => {
      const customMetrics = new MetricsCollector({ enabled: true, prefix: 'myapp_' });

      customMetrics.recordApiCall('getSite', 'GET', 200, 0.1);

      const output = await customMetrics.getMetrics();

      expect(output).toContain('myapp_api_calls_total');
    });

    it('should use default prefix when not specified', async () => {
      const defaultMetrics = new MetricsCollector({ enabled: true });

      defaultMetrics.recordApiCall('getSite', 'GET', 200, 0.1);

      const output = await defaultMetrics.getMetrics();

      expect(output).toContain('iri_client_api_calls_total');
    });
  });

  describe('Shared Registry', () => {
    it('should register into a provided registry', async () => {
      const registry = new Registry();
      const shared = new MetricsCollector({ enabled: true, prefix: 'shared_', registry });

      shared.recordApiCall('getSite', 'GET', 200, 0.1);

      expect(shared.getRegistry()).toBe(registry);
      expect(await registry.metrics()).toContain('shared_api_calls_total');
    });
  });
});
