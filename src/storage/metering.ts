// Byte metering stages for the compression pipeline.

import { Transform } from 'node:stream';

import type { ByteCountCallback } from './types.js';

/**
 * Pass-through stage reporting each chunk's size as it flows by.
 * The callback runs synchronously, before the chunk moves downstream.
 */
export function createMeter(callback: ByteCountCallback): Transform {
  return new Transform({
    transform(chunk: Buffer, _encoding, done) {
      callback(chunk.length);
      done(null, chunk);
    },
  });
}

/** Zero or one metering stage, so an absent callback costs nothing. */
export function meterStages(callback: ByteCountCallback | undefined): Transform[] {
  return callback ? [createMeter(callback)] : [];
}
