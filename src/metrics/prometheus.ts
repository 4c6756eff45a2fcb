// prom-client implementation of the metrics sink.

import { Counter, Histogram, register, type Registry } from 'prom-client';

import { MetricAlreadyRegisteredError } from './errors.js';
import type { MetricsFactory } from './types.js';

/**
 * Map a dotted metric name to a valid Prometheus name.
 * `blockstore.put.size_bytes` becomes `blockstore_put_size_bytes`.
 */
export function toPrometheusName(name: string): string {
  return name.replace(/[^a-zA-Z0-9_:]/g, '_');
}

/**
 * Create a metrics sink that registers instruments on a prom-client registry.
 * Defaults to the prom-client global registry.
 */
export function createPrometheusMetrics(registry: Registry = register): MetricsFactory {
  const claim = (name: string): string => {
    const promName = toPrometheusName(name);
    if (registry.getSingleMetric(promName)) {
      throw new MetricAlreadyRegisteredError(name);
    }
    return promName;
  };

  return {
    counter(name, help) {
      return new Counter({ name: claim(name), help, registers: [registry] });
    },
    histogram(name, help, buckets) {
      return new Histogram({
        name: claim(name),
        help,
        buckets: [...buckets],
        registers: [registry],
      });
    },
  };
}
