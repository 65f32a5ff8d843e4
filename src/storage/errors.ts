import createError from '@fastify/error';

// Storage errors (STORE_*)

/** Object does not exist. Normalized from every backend's own not-found signal (404) */
export const StoreNotFoundError = createError<[string]>(
  'STORE_NOT_FOUND',
  'Object not found: %s',
  404
);

/** Malformed location, unknown codec, starting point outside prefix (400) */
export const StoreInvalidUsageError = createError<[string]>(
  'STORE_INVALID_USAGE',
  '%s',
  400
);

/**
 * Any other failure reported by a backend. The original error is kept as `cause`.
 * Arguments: operation context (e.g. `s3 walk "blocks/"`), original message, `{ cause }`.
 */
export const StoreUpstreamError = createError<[string, string, { cause: unknown }]>(
  'STORE_UPSTREAM_ERROR',
  'Storage backend failure during %s: %s',
  502
);

/**
 * Control signal ending a walk early. Not a failure: `walk` resolves normally
 * when a visitor throws it.
 */
export const StopIterationError = createError('STORE_STOP_ITERATION', 'stop iteration');

function hasCode(error: unknown): error is { code: unknown } {
  return typeof error === 'object' && error !== null && 'code' in error;
}

export function isNotFoundError(error: unknown): boolean {
  return hasCode(error) && error.code === 'STORE_NOT_FOUND';
}

export function isStopIteration(error: unknown): boolean {
  return hasCode(error) && error.code === 'STORE_STOP_ITERATION';
}

function isPassthrough(error: unknown): error is Error {
  if (!(error instanceof Error)) return false;
  if (error.name === 'AbortError') return true;
  return hasCode(error) && typeof error.code === 'string' && error.code.startsWith('STORE_');
}

/**
 * Wrap a backend failure with enough context to diagnose it.
 * Errors already in the STORE_* family and caller aborts pass through untouched.
 */
export function upstream(context: string, error: unknown): Error {
  if (isPassthrough(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new StoreUpstreamError(context, message, { cause: error });
}
