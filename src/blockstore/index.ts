// Blockstore module barrel export and factory function.

import type { FastifyBaseLogger } from 'fastify';

import type { StorageConfig } from '../config/schema.js';

import { FsBlockstore } from './fs-blockstore.js';
import { MemoryBlockstore } from './memory-blockstore.js';
import { RedisBlockstore } from './redis-blockstore.js';
import { createRedisClient } from './redis-client.js';
import type { Blockstore } from './types.js';

export * from './types.js';
export { BlockNotFoundError, BlockHashMismatchError, InvalidCidError, isNotFound } from './errors.js';
export { computeCid, createBlock, isValidCid, verifyBlock } from './cid.js';
export { FsBlockstore } from './fs-blockstore.js';
export { MemoryBlockstore } from './memory-blockstore.js';
export { RedisBlockstore } from './redis-blockstore.js';
export { createRedisClient } from './redis-client.js';

/**
 * Create the configured storage backend.
 * The Redis backend connects before returning; closing the blockstore quits the client.
 */
export async function createBlockstore(
  config: StorageConfig,
  logger: FastifyBaseLogger
): Promise<Blockstore> {
  switch (config.backend) {
    case 'memory':
      return new MemoryBlockstore();
    case 'redis': {
      const redis = createRedisClient(config.redis, logger);
      await redis.connect();
      return new RedisBlockstore({ redis, keyPrefix: config.redis.keyPrefix });
    }
    case 'fs':
    default:
      return new FsBlockstore(config.fs.dataDir);
  }
}
