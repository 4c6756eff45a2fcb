import createError from '@fastify/error';

// Metrics errors (METRICS_*)

/** Metric name already registered in this registry (500) */
export const MetricAlreadyRegisteredError = createError<[string]>(
  'METRICS_DUPLICATE',
  'Metric already registered: %s',
  500
);
