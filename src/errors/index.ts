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

// Storage errors (STORE_*) - re-exported from storage domain
export {
  StoreNotFoundError,
  StoreInvalidUsageError,
  StoreUpstreamError,
  StopIterationError,
  isNotFoundError,
  isStopIteration,
  upstream,
} from '../storage/errors.js';

// Type for all application errors
export type AppError =
  | typeof ConfigInvalidError
  | typeof ConfigMissingError
  | typeof ConfigParseError;
