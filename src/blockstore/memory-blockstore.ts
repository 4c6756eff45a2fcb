// In-memory storage backend.
//
// Implements every optional capability, so a measured wrapper around it takes
// the direct view and batched delete paths. Used for local development and tests.
// Payloads are copied in and out; only view() exposes the stored bytes.

import { assertValidCid, verifyBlock } from './cid.js';
import { BlockNotFoundError } from './errors.js';
import type {
  AllKeysOptions,
  BatchDeleter,
  Block,
  Blockstore,
  Cid,
  Closer,
  HealthChecker,
  ViewCallback,
  Viewer,
} from './types.js';

export class MemoryBlockstore implements Blockstore, BatchDeleter, Viewer, Closer, HealthChecker {
  private readonly blocks = new Map<Cid, Uint8Array>();
  private verifyOnRead = false;

  async put(block: Block): Promise<void> {
    assertValidCid(block.cid);
    this.blocks.set(block.cid, Uint8Array.from(block.data));
  }

  async putMany(blocks: readonly Block[]): Promise<void> {
    for (const block of blocks) {
      assertValidCid(block.cid);
    }
    for (const block of blocks) {
      this.blocks.set(block.cid, Uint8Array.from(block.data));
    }
  }

  async get(cid: Cid): Promise<Block> {
    return { cid, data: Uint8Array.from(this.read(cid)) };
  }

  async has(cid: Cid): Promise<boolean> {
    assertValidCid(cid);
    return this.blocks.has(cid);
  }

  async getSize(cid: Cid): Promise<number> {
    assertValidCid(cid);
    const data = this.blocks.get(cid);
    if (!data) {
      throw new BlockNotFoundError(cid);
    }
    return data.byteLength;
  }

  async deleteBlock(cid: Cid): Promise<void> {
    assertValidCid(cid);
    this.blocks.delete(cid);
  }

  async deleteMany(cids: readonly Cid[]): Promise<void> {
    for (const cid of cids) {
      assertValidCid(cid);
    }
    for (const cid of cids) {
      this.blocks.delete(cid);
    }
  }

  async view<T>(cid: Cid, fn: ViewCallback<T>): Promise<T> {
    return fn(this.read(cid));
  }

  async *allKeys(options: AllKeysOptions = {}): AsyncGenerator<Cid> {
    // Snapshot so deletes during iteration don't affect the sequence
    for (const cid of [...this.blocks.keys()]) {
      if (options.signal?.aborted) return;
      yield cid;
    }
  }

  hashOnRead(enabled: boolean): void {
    this.verifyOnRead = enabled;
  }

  async close(): Promise<void> {
    this.blocks.clear();
  }

  async healthy(): Promise<boolean> {
    return true;
  }

  private read(cid: Cid): Uint8Array {
    assertValidCid(cid);
    const data = this.blocks.get(cid);
    if (!data) {
      throw new BlockNotFoundError(cid);
    }
    if (this.verifyOnRead) {
      verifyBlock(cid, data);
    }
    return data;
  }
}
