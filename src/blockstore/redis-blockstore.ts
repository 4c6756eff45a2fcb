// Redis storage backend.
//
// Each block is a binary string value at `<keyPrefix><cid>`. Supports batched
// deletes (one multi-key DEL), explicit close (QUIT) and health checks (PING).

import type { Redis } from 'ioredis';

import { assertValidCid, isValidCid, verifyBlock } from './cid.js';
import { BlockNotFoundError } from './errors.js';
import type {
  AllKeysOptions,
  BatchDeleter,
  Block,
  Blockstore,
  Cid,
  Closer,
  HealthChecker,
} from './types.js';

const DEFAULT_KEY_PREFIX = 'block:';
const SCAN_BATCH = 500;

function toBuffer(data: Uint8Array): Buffer {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

export class RedisBlockstore implements Blockstore, BatchDeleter, Closer, HealthChecker {
  private readonly redis: Redis;
  private readonly keyPrefix: string;
  private verifyOnRead = false;

  constructor(options: { redis: Redis; keyPrefix?: string }) {
    this.redis = options.redis;
    this.keyPrefix = options.keyPrefix ?? DEFAULT_KEY_PREFIX;
  }

  async put(block: Block): Promise<void> {
    await this.redis.set(this.keyFor(block.cid), toBuffer(block.data));
  }

  async putMany(blocks: readonly Block[]): Promise<void> {
    if (blocks.length === 0) return;
    const entries = new Map<string, Buffer>();
    for (const block of blocks) {
      entries.set(this.keyFor(block.cid), toBuffer(block.data));
    }
    await this.redis.mset(entries);
  }

  async get(cid: Cid): Promise<Block> {
    const data = await this.redis.getBuffer(this.keyFor(cid));
    if (data === null) {
      throw new BlockNotFoundError(cid);
    }
    if (this.verifyOnRead) {
      verifyBlock(cid, data);
    }
    return { cid, data };
  }

  async has(cid: Cid): Promise<boolean> {
    return (await this.redis.exists(this.keyFor(cid))) === 1;
  }

  async getSize(cid: Cid): Promise<number> {
    const key = this.keyFor(cid);
    const size = await this.redis.strlen(key);
    // STRLEN reports 0 for missing keys and for empty blocks alike
    if (size === 0 && (await this.redis.exists(key)) === 0) {
      throw new BlockNotFoundError(cid);
    }
    return size;
  }

  async deleteBlock(cid: Cid): Promise<void> {
    await this.redis.del(this.keyFor(cid));
  }

  async deleteMany(cids: readonly Cid[]): Promise<void> {
    if (cids.length === 0) return;
    const keys = cids.map((cid) => this.keyFor(cid));
    await this.redis.del(...keys);
  }

  async *allKeys(options: AllKeysOptions = {}): AsyncGenerator<Cid> {
    // SCAN may return a key more than once
    const seen = new Set<Cid>();
    let cursor = '0';
    do {
      if (options.signal?.aborted) return;
      const [next, keys] = await this.redis.scan(
        cursor,
        'MATCH',
        `${this.keyPrefix}*`,
        'COUNT',
        SCAN_BATCH
      );
      cursor = next;
      for (const key of keys) {
        if (options.signal?.aborted) return;
        const cid = key.slice(this.keyPrefix.length);
        if (isValidCid(cid) && !seen.has(cid)) {
          seen.add(cid);
          yield cid;
        }
      }
    } while (cursor !== '0');
  }

  hashOnRead(enabled: boolean): void {
    this.verifyOnRead = enabled;
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }

  async healthy(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === 'PONG';
    } catch {
      return false;
    }
  }

  private keyFor(cid: Cid): string {
    assertValidCid(cid);
    return this.keyPrefix + cid;
  }
}
