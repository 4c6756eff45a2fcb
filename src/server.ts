import { randomUUID } from 'node:crypto';

import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import multipart from '@fastify/multipart';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { FastifyInstance } from 'fastify';
import fastify from 'fastify';
import {
  jsonSchemaTransform,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';
import { collectDefaultMetrics, Registry } from 'prom-client';

import { createBlockstore, isCloser, type Blockstore } from './blockstore/index.js';
import type { Config } from './config/index.js';
import { newMeasuredBlockstore, type MeasuredBlockstore } from './measure/index.js';
import { createPrometheusMetrics } from './metrics/index.js';
import { errorHandlerPlugin } from './plugins/error-handler.js';
import { requestLoggerPlugin } from './plugins/request-logger.js';
import { blockRoutesPlugin, MAX_BATCH_BLOCKS, MAX_BLOCK_BYTES } from './routes/blocks.js';
import { healthRoutesPlugin } from './routes/health.js';
import { metricsRoutesPlugin } from './routes/metrics.js';

// Import types to ensure augmentation is loaded
import './types/index.js';

export interface CreateServerOptions {
  config: Config;
  /** Storage backend to wrap; built from `config.storage` when omitted */
  backend?: Blockstore;
  /** Registry for blockstore metrics; a fresh registry per server by default */
  registry?: Registry;
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const { config } = options;
  const isDev = config.env === 'development';

  const server = fastify({
    logger: {
      level: config.logging.level,
      transport: config.logging.pretty
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    },
    // Request ID handling
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
    // Disable default request logging (we use custom plugin)
    disableRequestLogging: true,
    // JSON bodies are small; block uploads set their own limit
    bodyLimit: 51200,
  });

  // Zod type provider compilers (enables Zod schemas in route schema declarations)
  server.setValidatorCompiler(validatorCompiler);
  server.setSerializerCompiler(serializerCompiler);

  // Decorate server with config for access in routes
  server.decorate('config', config);

  // Security headers
  await server.register(helmet, {
    global: true,
    contentSecurityPolicy: isDev ? false : undefined,
  });

  // Rate limiting
  await server.register(rateLimit, {
    max: config.rateLimit.global,
    timeWindow: config.rateLimit.windowMs,
  });

  // CORS - permissive in dev, restrictive in prod
  await server.register(cors, {
    origin: isDev ? true : false,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID'],
  });

  // Multipart support (block uploads)
  await server.register(multipart, {
    limits: { fileSize: MAX_BLOCK_BYTES, files: MAX_BATCH_BLOCKS },
  });

  // Custom plugins
  await server.register(errorHandlerPlugin, { isDev });
  await server.register(requestLoggerPlugin, { isDev, quietUrls: ['/health', '/metrics'] });

  // ---- OpenAPI documentation ----
  await server.register(swagger, {
    openapi: {
      openapi: '3.0.3',
      info: {
        title: 'Measured Blockstore',
        description: 'Content-addressed block storage with per-operation metrics.',
        version: '1.0.0',
      },
      servers: [{ url: 'http://localhost:3000', description: 'Development' }],
      tags: [
        { name: 'Health', description: 'Server health' },
        { name: 'Blocks', description: 'Block storage operations' },
        { name: 'Metrics', description: 'Prometheus exposition' },
      ],
    },
    transform: jsonSchemaTransform,
  });

  await server.register(swaggerUi, {
    routePrefix: '/docs',
  });

  // ---- Storage layer initialization ----
  const registry = options.registry ?? new Registry();
  if (config.metrics.defaultMetrics) {
    collectDefaultMetrics({ register: registry });
  }

  const backend = options.backend ?? (await createBlockstore(config.storage, server.log));
  let blockstore: MeasuredBlockstore;
  try {
    blockstore = newMeasuredBlockstore(
      config.metrics.prefix,
      backend,
      createPrometheusMetrics(registry)
    );
  } catch (err) {
    // Release the backend connection; the onClose hook is not registered yet
    if (isCloser(backend)) {
      await backend.close();
    }
    throw err;
  }
  if (config.storage.hashOnRead) {
    blockstore.hashOnRead(true);
  }

  server.decorate('metricsRegistry', registry);
  server.decorate('blockstore', blockstore);

  server.log.info(
    {
      backend: options.backend ? 'custom' : config.storage.backend,
      prefix: config.metrics.prefix,
      hashOnRead: config.storage.hashOnRead,
      capabilities: blockstore.capabilities,
    },
    'Storage layer initialized'
  );

  server.addHook('onClose', async () => {
    await blockstore.close();
    server.log.info('Storage layer shutdown complete');
  });

  // Routes
  await server.register(healthRoutesPlugin);
  await server.register(blockRoutesPlugin);
  await server.register(metricsRoutesPlugin);

  return server;
}
