// Block storage contract.
//
// The mandatory contract is what every backend implements. Optional
// capabilities are separate interfaces; callers probe for them at runtime
// with the type guards below instead of requiring every backend to carry them.

/** Content identifier: lowercase hex SHA-256 digest of the block payload */
export type Cid = string;

/** Immutable content-addressed byte payload */
export interface Block {
  readonly cid: Cid;
  readonly data: Uint8Array;
}

export interface AllKeysOptions {
  /** Aborting ends the key sequence; honored by the backend */
  signal?: AbortSignal;
}

/**
 * Mandatory block storage contract.
 * `get` and `getSize` reject with BlockNotFoundError when the block is absent.
 */
export interface Blockstore {
  /** Store one block */
  put(block: Block): Promise<void>;

  /** Store a batch of blocks */
  putMany(blocks: readonly Block[]): Promise<void>;

  /** Retrieve a block by identifier */
  get(cid: Cid): Promise<Block>;

  /** Check if a block exists */
  has(cid: Cid): Promise<boolean>;

  /** Payload size in bytes */
  getSize(cid: Cid): Promise<number>;

  /** Remove one block; removing an absent block is a no-op */
  deleteBlock(cid: Cid): Promise<void>;

  /** Lazily enumerate every stored identifier */
  allKeys(options?: AllKeysOptions): AsyncIterable<Cid>;

  /** Toggle payload hash verification on read */
  hashOnRead(enabled: boolean): void;
}

/** Consumer invoked with a view of the stored bytes; must not retain it */
export type ViewCallback<T> = (data: Uint8Array) => T | Promise<T>;

export interface BatchDeleter {
  deleteMany(cids: readonly Cid[]): Promise<void>;
}

export interface Viewer {
  view<T>(cid: Cid, fn: ViewCallback<T>): Promise<T>;
}

export interface Closer {
  close(): Promise<void>;
}

export interface HealthChecker {
  /** Returns true if the backend is operational */
  healthy(): Promise<boolean>;
}

export function isBatchDeleter(store: Blockstore): store is Blockstore & BatchDeleter {
  return 'deleteMany' in store && typeof store.deleteMany === 'function';
}

export function isViewer(store: Blockstore): store is Blockstore & Viewer {
  return 'view' in store && typeof store.view === 'function';
}

export function isCloser(store: Blockstore): store is Blockstore & Closer {
  return 'close' in store && typeof store.close === 'function';
}

export function isHealthChecker(store: Blockstore): store is Blockstore & HealthChecker {
  return 'healthy' in store && typeof store.healthy === 'function';
}
