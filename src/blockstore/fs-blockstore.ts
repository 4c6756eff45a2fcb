// Filesystem storage backend.
//
// Stores each block as a file named by its identifier (SHA-256 hex) under a
// data directory. Implements the mandatory contract only, plus a health check;
// a measured wrapper falls back to get() for views and to per-block deletes.

import type { Dir } from 'node:fs';
import { access, mkdir, opendir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { assertValidCid, isValidCid, verifyBlock } from './cid.js';
import { BlockNotFoundError } from './errors.js';
import type { AllKeysOptions, Block, Blockstore, Cid, HealthChecker } from './types.js';

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class FsBlockstore implements Blockstore, HealthChecker {
  private readonly dataDir: string;
  private initialized = false;
  private verifyOnRead = false;

  constructor(dataDir: string) {
    this.dataDir = dataDir;
  }

  async put(block: Block): Promise<void> {
    const filePath = this.pathFor(block.cid);
    await this.ensureDir();
    await writeFile(filePath, block.data);
  }

  async putMany(blocks: readonly Block[]): Promise<void> {
    for (const block of blocks) {
      assertValidCid(block.cid);
    }
    for (const block of blocks) {
      await this.put(block);
    }
  }

  async get(cid: Cid): Promise<Block> {
    const filePath = this.pathFor(cid);
    let data: Buffer;
    try {
      data = await readFile(filePath);
    } catch (err) {
      if (isMissing(err)) {
        throw new BlockNotFoundError(cid);
      }
      throw err;
    }
    if (this.verifyOnRead) {
      verifyBlock(cid, data);
    }
    return { cid, data };
  }

  async has(cid: Cid): Promise<boolean> {
    const filePath = this.pathFor(cid);
    try {
      await access(filePath);
      return true;
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  async getSize(cid: Cid): Promise<number> {
    const filePath = this.pathFor(cid);
    try {
      const stats = await stat(filePath);
      return stats.size;
    } catch (err) {
      if (isMissing(err)) {
        throw new BlockNotFoundError(cid);
      }
      throw err;
    }
  }

  async deleteBlock(cid: Cid): Promise<void> {
    await rm(this.pathFor(cid), { force: true });
  }

  async *allKeys(options: AllKeysOptions = {}): AsyncGenerator<Cid> {
    let dir: Dir;
    try {
      dir = await opendir(this.dataDir);
    } catch (err) {
      // Nothing written yet
      if (isMissing(err)) return;
      throw err;
    }

    // Breaking out of the loop closes the directory handle
    for await (const entry of dir) {
      if (options.signal?.aborted) return;
      if (entry.isFile() && isValidCid(entry.name)) {
        yield entry.name;
      }
    }
  }

  hashOnRead(enabled: boolean): void {
    this.verifyOnRead = enabled;
  }

  async healthy(): Promise<boolean> {
    try {
      await this.ensureDir();
      return true;
    } catch {
      return false;
    }
  }

  private pathFor(cid: Cid): string {
    // Only hex digests reach the filesystem (path traversal protection)
    assertValidCid(cid);
    return join(this.dataDir, cid);
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.dataDir, { recursive: true });
    this.initialized = true;
  }
}
