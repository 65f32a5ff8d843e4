// Storage module barrel export and factory functions.

import { AzureStore } from './azure-backend.js';
import { resolveStoreOptions } from './config.js';
import type { StoreOptions } from './config.js';
import { LocalStore } from './fs-backend.js';
import { GsStore } from './gs-backend.js';
import { parseLocation } from './location.js';
import { MemoryStore } from './memory-backend.js';
import { S3Store } from './s3-backend.js';
import type { Store } from './types.js';

export type {
  ByteCountCallback,
  CallOptions,
  CompressionType,
  MeteringHooks,
  ObjectAttributes,
  Store,
  StoreKind,
  StoreSettings,
  WalkSignal,
  WalkVisitor,
  WriteSource,
} from './types.js';
export { STOP } from './types.js';
export type { StoreOptions, StoreOptionsInput } from './config.js';
export { StoreOptionsSchema, resolveStoreOptions } from './config.js';
export type {
  AzureLocation,
  GsLocation,
  LocalLocation,
  Location,
  MemoryLocation,
  S3Location,
} from './location.js';
export { parseLocation } from './location.js';
export {
  StopIterationError,
  StoreInvalidUsageError,
  StoreNotFoundError,
  StoreUpstreamError,
  isNotFoundError,
  isStopIteration,
} from './errors.js';
export { parseCompression } from './compression.js';
export { LocalStore } from './fs-backend.js';
export { MemoryStore } from './memory-backend.js';
export { MockStore } from './mock-backend.js';
export type { MockStoreOptions, MockStoreOverrides } from './mock-backend.js';
export { S3Store, createS3Client } from './s3-backend.js';
export { GsStore } from './gs-backend.js';
export { AzureStore, createContainerClient } from './azure-backend.js';

/**
 * Create a store for a base location.
 *
 * Validation (location shape, options, codec name) happens before any I/O;
 * the local backend then makes sure its base directory exists.
 */
export async function createStore(location: string, options: StoreOptions = {}): Promise<Store> {
  const parsed = parseLocation(location);
  const { settings, s3, azure } = resolveStoreOptions(options);

  switch (parsed.kind) {
    case 'local':
      return new LocalStore(parsed.path, settings).ensureDir();
    case 'memory':
      return new MemoryStore(parsed.url, settings);
    case 's3':
      return new S3Store(parsed, settings, s3);
    case 'gs':
      return new GsStore(parsed, settings);
    case 'az':
      return new AzureStore(parsed, settings, azure.accountKey);
  }
}

type PresetOptions = Omit<StoreOptions, 'extension' | 'compression' | 'overwrite'>;

/** `<name>.dbin.zst` objects, zstd-compressed, never overwritten */
export function createDBinStore(location: string, options: PresetOptions = {}): Promise<Store> {
  return createStore(location, { ...options, extension: 'dbin.zst', compression: 'zstd', overwrite: false });
}

/** `<name>.jsonl.gz` objects, gzip-compressed, never overwritten */
export function createJSONLStore(location: string, options: PresetOptions = {}): Promise<Store> {
  return createStore(location, { ...options, extension: 'jsonl.gz', compression: 'gzip', overwrite: false });
}

/** Objects stored as-is under their own name, overwritten on write */
export function createSimpleStore(location: string, options: PresetOptions = {}): Promise<Store> {
  return createStore(location, { ...options, extension: '', compression: 'none', overwrite: true });
}
