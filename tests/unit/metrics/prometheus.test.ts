import { Registry } from 'prom-client';
import { describe, it, expect, beforeEach } from 'vitest';

import { createPrometheusMetrics, toPrometheusName } from '@/metrics/prometheus.js';
import type { MetricsFactory } from '@/metrics/types.js';

describe('toPrometheusName', () => {
  it('should replace dots with underscores', () => {
    expect(toPrometheusName('blockstore.put.size_bytes')).toBe('blockstore_put_size_bytes');
  });

  it('should keep colons and alphanumerics', () => {
    expect(toPrometheusName('ns:store.get_total')).toBe('ns:store_get_total');
  });
});

describe('createPrometheusMetrics', () => {
  let registry: Registry;
  let metrics: MetricsFactory;

  beforeEach(() => {
    registry = new Registry();
    metrics = createPrometheusMetrics(registry);
  });

  it('should expose counters under the mapped name', async () => {
    const counter = metrics.counter('t.put_total', 'Total number of Blockstore.Put calls');
    counter.inc();
    counter.inc();

    const output = await registry.metrics();
    expect(output).toMatch(/^# HELP t_put_total Total number of Blockstore\.Put calls$/m);
    expect(output).toMatch(/^# TYPE t_put_total counter$/m);
    expect(output).toMatch(/^t_put_total 2$/m);
  });

  it('should expose histograms with the given bucket bounds', async () => {
    const histogram = metrics.histogram('t.get.size_bytes', 'Sizes', [64, 4096]);
    histogram.observe(10);
    histogram.observe(100);

    const output = await registry.metrics();
    expect(output).toMatch(/^t_get_size_bytes_bucket\{le="64"\} 1$/m);
    expect(output).toMatch(/^t_get_size_bytes_bucket\{le="4096"\} 2$/m);
    expect(output).toMatch(/^t_get_size_bytes_bucket\{le="\+Inf"\} 2$/m);
    expect(output).toMatch(/^t_get_size_bytes_sum 110$/m);
    expect(output).toMatch(/^t_get_size_bytes_count 2$/m);
  });

  it('should reject a name already registered', () => {
    metrics.counter('t.put_total', 'first');

    expect(() => metrics.counter('t.put_total', 'second')).toThrow(
      'Metric already registered: t.put_total'
    );
  });

  it('should reject a name that maps onto an existing metric', () => {
    metrics.histogram('t.put.latency_seconds', 'first', [1]);

    expect(() => metrics.counter('t_put_latency_seconds', 'second')).toThrow(
      expect.objectContaining({ code: 'METRICS_DUPLICATE', statusCode: 500 })
    );
  });

  it('should keep separate registries independent', () => {
    metrics.counter('t.put_total', 'first');
    const other = createPrometheusMetrics(new Registry());

    expect(() => other.counter('t.put_total', 'second')).not.toThrow();
  });
});
