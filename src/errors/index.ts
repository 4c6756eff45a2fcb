import createError from '@fastify/error';

// Configuration errors (CONFIG_*)
export const ConfigInvalidError = createError<[string]>(
  'CONFIG_INVALID',
  'Invalid configuration: %s',
  500
);

export const ConfigMissingError = createError<[string]>(
  'CONFIG_MISSING',
  'Missing configuration file: %s',
  500
);

export const ConfigParseError = createError<[string]>(
  'CONFIG_PARSE_ERROR',
  'Failed to parse configuration: %s',
  500
);

// Storage errors (BLOCK_*) - re-exported from blockstore domain
export {
  BlockNotFoundError,
  BlockHashMismatchError,
  InvalidCidError,
} from '../blockstore/errors.js';

// Metrics errors (METRICS_*) - re-exported from metrics domain
export { MetricAlreadyRegisteredError } from '../metrics/errors.js';

// Request errors (REQUEST_*)

/** Multipart request carried no file part (400) */
export const RequestNoFileError = createError<[string]>(
  'REQUEST_NO_FILE',
  'No block data provided: %s',
  400
);
