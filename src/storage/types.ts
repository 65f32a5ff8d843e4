// Storage contract shared by every backend.
//
// A store maps logical object names to physical paths under one base
// location and exposes the same write/read/walk/delete operation set whether
// the bytes live on local disk, in S3, in Google Cloud Storage or in Azure.

import type { Readable } from 'node:stream';

import type { Logger } from 'pino';

/** Codec applied on write and undone on read. */
export type CompressionType = 'none' | 'gzip' | 'zstd';

/** Snapshot of an object's attributes, valid only at retrieval time. */
export interface ObjectAttributes {
  /** Size of the stored (possibly compressed) object in bytes */
  size: number;
  lastModified: Date;
}

/** Byte-count callback, invoked synchronously once per chunk with that chunk's size. */
export type ByteCountCallback = (bytes: number) => void;

/**
 * Optional metering callbacks. A missing callback adds no stage to the stream.
 * Aggregation is the caller's job: the store keeps no counters.
 */
export interface MeteringHooks {
  compressedWrite?: ByteCountCallback;
  uncompressedWrite?: ByteCountCallback;
  compressedRead?: ByteCountCallback;
  uncompressedRead?: ByteCountCallback;
}

/** Returned by a walk visitor to end the walk successfully. */
export const STOP = Symbol('polystore.stop');

export type WalkSignal = typeof STOP;

/**
 * Called once per object name during a walk. Return `STOP` (or throw
 * `StopIterationError`) to end the walk early; any other thrown error
 * aborts the walk and rejects it.
 */
export type WalkVisitor = (name: string) => void | WalkSignal | Promise<void | WalkSignal>;

export interface CallOptions {
  /** Aborts in-flight network calls and the compression/transfer streams */
  signal?: AbortSignal;
}

/** Anything `writeObject` accepts as content. */
export type WriteSource = Readable | Uint8Array | string;

/** Backend kinds produced by the location parser. */
export type StoreKind = 'local' | 's3' | 'gs' | 'az' | 'memory' | 'mock';

/**
 * Immutable store configuration. Changing any of it means deriving a new
 * store with `clone()`, never mutating one with operations in flight.
 */
export interface StoreSettings {
  /** Suffix appended as `.<extension>` to every object name ("" for none) */
  extension: string;
  compression: CompressionType;
  /** When false, writing an existing name is a successful no-op */
  overwrite: boolean;
  /** Delay before the existence check of `pushLocalFile` (0 disables the check) */
  pushVerifyDelayMs: number;
  hooks: MeteringHooks;
  logger: Logger;
}

/**
 * Abstract object store.
 * Implementations must keep `toBaseName(objectPath(name)) === name` for every
 * valid name and enumerate names in ascending order.
 */
export interface Store {
  readonly kind: StoreKind;
  readonly baseUrl: URL;
  readonly overwrite: boolean;

  /** Physical path (local) or key (cloud) of an object */
  objectPath(name: string): string;

  /** Fully qualified URL of an object */
  objectUrl(name: string): string;

  /** Inverse of `objectPath` */
  toBaseName(path: string): string;

  /** Write an object. Resolves once the content is committed */
  writeObject(name: string, source: WriteSource, options?: CallOptions): Promise<void>;

  /** Open an object for reading. Rejects with StoreNotFoundError when missing */
  openObject(name: string, options?: CallOptions): Promise<Readable>;

  fileExists(name: string, options?: CallOptions): Promise<boolean>;

  objectAttributes(name: string, options?: CallOptions): Promise<ObjectAttributes>;

  deleteObject(name: string, options?: CallOptions): Promise<void>;

  copyObject(source: string, destination: string, options?: CallOptions): Promise<void>;

  /** Upload a local file then delete it, verifying the upload first when configured */
  pushLocalFile(localFile: string, toBaseName: string, options?: CallOptions): Promise<void>;

  walk(prefix: string, visit: WalkVisitor, options?: CallOptions): Promise<void>;

  walkFrom(
    prefix: string,
    startingPoint: string,
    visit: WalkVisitor,
    options?: CallOptions
  ): Promise<void>;

  /** Names under `prefix`, at most `max` of them (negative for unbounded) */
  listFiles(prefix: string, max: number, options?: CallOptions): Promise<string[]>;

  /** Lazy iteration over the same names `walkFrom` visits */
  iterate(prefix: string, startingPoint?: string, options?: CallOptions): AsyncIterable<string>;

  /** Store scoped to a sub-folder, sharing this store's client */
  subStore(subFolder: string): Promise<Store>;

  /** Fresh store over the same location, with optional setting overrides */
  clone(overrides?: Partial<Omit<StoreSettings, 'logger'>>): Promise<Store>;

  /** Release the underlying client */
  close(): Promise<void>;
}
