// Content addressing: identifiers are the SHA-256 hex digest of the payload.

import { createHash } from 'node:crypto';

import { BlockHashMismatchError, InvalidCidError } from './errors.js';
import type { Block, Cid } from './types.js';

const CID_PATTERN = /^[a-f0-9]{64}$/;

export function computeCid(data: Uint8Array): Cid {
  return createHash('sha256').update(data).digest('hex');
}

export function isValidCid(value: string): value is Cid {
  return CID_PATTERN.test(value);
}

/**
 * Throw InvalidCidError unless the identifier is well-formed.
 * Backends call this before touching keys or paths built from the identifier.
 */
export function assertValidCid(value: string): void {
  if (!isValidCid(value)) {
    throw new InvalidCidError(value);
  }
}

export function createBlock(data: Uint8Array): Block {
  return { cid: computeCid(data), data };
}

/** Throw BlockHashMismatchError if the payload no longer hashes to its identifier */
export function verifyBlock(cid: Cid, data: Uint8Array): void {
  if (computeCid(data) !== cid) {
    throw new BlockHashMismatchError(cid);
  }
}
