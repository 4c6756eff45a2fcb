import createError from '@fastify/error';

// Block storage errors (BLOCK_*)

/** Requested block is not stored (404). Expected outcome, not a failure. */
export const BlockNotFoundError = createError<[string]>(
  'BLOCK_NOT_FOUND',
  'Block not found: %s',
  404
);

/** Stored payload does not hash to its identifier (500) */
export const BlockHashMismatchError = createError<[string]>(
  'BLOCK_HASH_MISMATCH',
  'Block data does not match identifier: %s',
  500
);

/** Identifier is not a lowercase hex SHA-256 digest (400) */
export const InvalidCidError = createError<[string]>(
  'BLOCK_INVALID_CID',
  'Invalid content identifier: %s',
  400
);

/**
 * Check for the not-found condition by error code, so backends outside this
 * package can signal it without sharing the constructor.
 */
export function isNotFound(err: unknown): boolean {
  return (
    typeof err === 'object' && err !== null && 'code' in err && err.code === 'BLOCK_NOT_FOUND'
  );
}
