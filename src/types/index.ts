// measured-blockstore type definitions

import type { Registry } from 'prom-client';

import type { Config } from '../config/index.js';
import type { MeasuredBlockstore } from '../measure/measured-blockstore.js';

// Augment Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    blockstore: MeasuredBlockstore;
    metricsRegistry: Registry;
  }
}
