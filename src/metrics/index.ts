// Metrics module barrel export.

export type { Counter, Histogram, MetricsFactory } from './types.js';
export { MetricAlreadyRegisteredError } from './errors.js';
export { createPrometheusMetrics, toPrometheusName } from './prometheus.js';
