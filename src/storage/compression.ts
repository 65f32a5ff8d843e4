// Streaming compression pipeline.
//
// Writes flow source -> [uncompressed meter] -> encoder -> [compressed meter] -> destination.
// Reads flow source -> [compressed meter] -> decoder -> [uncompressed meter] -> caller.

import { Readable, Transform, pipeline as pipelineCallback } from 'node:stream';
import type { Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { createGunzip, createGzip } from 'node:zlib';

import { CompressStream, DecompressStream } from 'zstd-napi';

import { StoreInvalidUsageError } from './errors.js';
import { meterStages } from './metering.js';
import type { CompressionType, MeteringHooks, WriteSource } from './types.js';

/**
 * Normalize a codec name. Accepts `""`/`none`, `gzip`/`gz` and `zstd`.
 */
export function parseCompression(value: string | undefined): CompressionType {
  switch (value ?? '') {
    case '':
    case 'none':
      return 'none';
    case 'gz':
    case 'gzip':
      return 'gzip';
    case 'zstd':
      return 'zstd';
    default:
      throw new StoreInvalidUsageError(
        `unsupported compression type "${value}", expected one of: none, gzip, zstd`
      );
  }
}

function encoderStages(codec: CompressionType): Transform[] {
  switch (codec) {
    case 'gzip':
      return [createGzip()];
    case 'zstd':
      return [new CompressStream()];
    case 'none':
      return [];
  }
}

function decoderStages(codec: CompressionType): Transform[] {
  switch (codec) {
    case 'gzip':
      return [createGunzip()];
    case 'zstd':
      return [new DecompressStream()];
    case 'none':
      return [];
  }
}

/** Turn any accepted write source into a byte stream. */
export function toReadable(source: WriteSource): Readable {
  if (source instanceof Readable) return source;
  const bytes = typeof source === 'string' ? Buffer.from(source) : Buffer.from(source.buffer, source.byteOffset, source.byteLength);
  return Readable.from([bytes], { objectMode: false });
}

/**
 * Copy `source` through the codec's encoder into `destination`.
 *
 * Resolves only after the encoder has flushed its footer and the destination
 * has finished, so the written bytes are complete when this returns.
 */
export async function encode(
  destination: Writable,
  source: Readable,
  codec: CompressionType,
  hooks: MeteringHooks,
  signal?: AbortSignal
): Promise<void> {
  await pipeline(
    [
      source,
      ...meterStages(hooks.uncompressedWrite),
      ...encoderStages(codec),
      ...meterStages(hooks.compressedWrite),
      destination,
    ],
    { signal }
  );
}

/**
 * Wrap `source` in the codec's decoder.
 *
 * Nothing is read here: a corrupt or mismatched stream only fails once the
 * caller starts consuming the returned stream.
 */
export function decode(source: Readable, codec: CompressionType, hooks: MeteringHooks): Readable {
  const stages = [
    ...meterStages(hooks.compressedRead),
    ...decoderStages(codec),
    ...meterStages(hooks.uncompressedRead),
  ];
  const last = stages[stages.length - 1];
  if (!last) return source;

  pipelineCallback([source, ...stages], (error) => {
    // pipeline already destroys every stage on failure; make sure the reader sees it
    if (error && !last.destroyed) last.destroy(error);
  });
  return last;
}
