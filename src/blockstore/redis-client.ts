// Redis client factory with lazy connect and retry strategy

import type { FastifyBaseLogger } from 'fastify';
import { Redis } from 'ioredis';

import type { StorageConfig } from '../config/schema.js';

/**
 * Create a Redis client for the Redis blockstore.
 *
 * The client uses `lazyConnect: true` so the caller must explicitly
 * call `.connect()` when ready. Retry strategy caps backoff at 2 seconds.
 *
 * @param config - Redis connection config (host, port, password?, username?, db)
 * @param logger - Logger for connection events
 * @returns Redis instance (not yet connected)
 */
export function createRedisClient(
  config: StorageConfig['redis'],
  logger: FastifyBaseLogger
): Redis {
  const client = new Redis({
    host: config.host,
    port: config.port,
    ...(config.password && { password: config.password }),
    ...(config.username && { username: config.username }),
    db: config.db,
    lazyConnect: true,
    maxRetriesPerRequest: 3,
    retryStrategy(times: number): number {
      return Math.min(times * 200, 2000);
    },
  });

  client.on('connect', () => {
    logger.info({ host: config.host, port: config.port }, 'Redis connected');
  });

  client.on('error', (err: Error) => {
    logger.error({ err: err.message }, 'Redis connection error');
  });

  client.on('close', () => {
    logger.info('Redis connection closed');
  });

  return client;
}
