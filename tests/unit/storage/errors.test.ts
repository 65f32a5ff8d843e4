import { describe, it, expect } from 'vitest';

import {
  StopIterationError,
  StoreInvalidUsageError,
  StoreNotFoundError,
  StoreUpstreamError,
  isNotFoundError,
  isStopIteration,
  upstream,
} from '@/storage/errors.js';

describe('storage errors', () => {
  it('should carry codes, status codes and messages', () => {
    const notFound = new StoreNotFoundError('blocks/0001');
    expect(notFound.code).toBe('STORE_NOT_FOUND');
    expect(notFound.statusCode).toBe(404);
    expect(notFound.message).toBe('Object not found: blocks/0001');

    const invalid = new StoreInvalidUsageError('bad location');
    expect(invalid.code).toBe('STORE_INVALID_USAGE');
    expect(invalid.statusCode).toBe(400);
    expect(invalid.message).toBe('bad location');
  });

  it('should recognize not-found and stop errors by code', () => {
    expect(isNotFoundError(new StoreNotFoundError('x'))).toBe(true);
    expect(isNotFoundError(new Error('x'))).toBe(false);
    expect(isNotFoundError(undefined)).toBe(false);
    expect(isStopIteration(new StopIterationError())).toBe(true);
    expect(isStopIteration(new StoreNotFoundError('x'))).toBe(false);
  });

  describe('upstream()', () => {
    it('should wrap backend failures and keep the cause', () => {
      const cause = new Error('socket hang up');
      const wrapped = upstream('s3 open "a"', cause);

      expect(wrapped).toBeInstanceOf(StoreUpstreamError);
      expect(wrapped.message).toBe('Storage backend failure during s3 open "a": socket hang up');
      expect(wrapped.cause).toBe(cause);
    });

    it('should wrap non-Error values', () => {
      expect(upstream('gs list', 'boom').message).toBe('Storage backend failure during gs list: boom');
    });

    it('should pass storage errors through', () => {
      const notFound = new StoreNotFoundError('a');
      expect(upstream('ctx', notFound)).toBe(notFound);
    });

    it('should pass aborts through', () => {
      const controller = new AbortController();
      controller.abort();
      const reason: unknown = controller.signal.reason;

      expect(upstream('ctx', reason)).toBe(reason);
    });
  });
});
