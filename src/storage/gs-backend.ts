// Google Cloud Storage store.
//
// No-overwrite writes are conditional on the object not existing yet
// (generation 0), so concurrent writers race safely: the losers get a 412,
// which is treated as success.

import { once } from 'node:events';
import { addAbortSignal } from 'node:stream';
import type { Readable } from 'node:stream';

import { Storage } from '@google-cloud/storage';
import type { Bucket, File, GetFilesOptions } from '@google-cloud/storage';

import { CommonStore } from './common.js';
import { StoreNotFoundError, upstream } from './errors.js';
import type { GsLocation } from './location.js';
import { trimSeparatorPrefix, trimSeparatorSuffix } from './paths.js';
import type {
  CallOptions,
  ObjectAttributes,
  Store,
  StoreSettings,
  WalkVisitor,
  WriteSource,
} from './types.js';
import { inNameOrder } from './walk.js';
import type { NameLister } from './walk.js';

const NOT_FOUND = 404;
const PRECONDITION_FAILED = 412;

/** HTTP status of an ApiError (`code`) or of a raw response error (`statusCode`) */
function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('code' in error && typeof error.code === 'number') return error.code;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

/**
 * Starts `work` unless `signal` has already fired, then settles with it or
 * rejects with the abort reason as soon as `signal` fires. The client takes
 * no signal, so an aborted call is abandoned, not cancelled.
 */
async function abortable<T>(work: () => Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return work();
  signal.throwIfAborted();

  const listening = new AbortController();
  const aborted = once(signal, 'abort', { signal: listening.signal }).then((): never => {
    throw signal.reason;
  });
  try {
    return await Promise.race([work(), aborted]);
  } finally {
    listening.abort();
  }
}

export class GsStore implements Store {
  readonly kind = 'gs' as const;
  readonly baseUrl: URL;
  private readonly common: CommonStore;

  constructor(
    private readonly location: GsLocation,
    settings: StoreSettings,
    private readonly client: Storage = new Storage()
  ) {
    this.baseUrl = location.url;
    this.common = new CommonStore('gs', settings, location.path);
  }

  get overwrite(): boolean {
    return this.common.overwrite;
  }

  private get bucket(): Bucket {
    return this.client.bucket(this.location.bucket, { userProject: this.location.userProject });
  }

  private file(name: string): File {
    return this.bucket.file(this.objectPath(name));
  }

  objectPath(name: string): string {
    return this.common.paths.objectPath(name);
  }

  objectUrl(name: string): string {
    return this.common.paths.objectUrl(this.baseUrl, name);
  }

  toBaseName(path: string): string {
    return this.common.paths.toBaseName(path);
  }

  async writeObject(name: string, source: WriteSource, options: CallOptions = {}): Promise<void> {
    const path = this.objectPath(name);
    const destination = this.file(name).createWriteStream({
      resumable: false,
      contentType: 'application/octet-stream',
      metadata: { cacheControl: 'public, max-age=86400' },
      preconditionOpts: this.overwrite ? undefined : { ifGenerationMatch: 0 },
    });

    this.common.log.debug({ bucket: this.location.bucket, path }, 'Uploading object');
    try {
      await this.common.compressedCopy(destination, source, options.signal);
    } catch (error) {
      if (!this.overwrite && statusOf(error) === PRECONDITION_FAILED) {
        this.common.log.debug({ path }, 'Object exists and overwrite is disabled, skipping write');
        return;
      }
      throw upstream(`gs write "${path}"`, error);
    }
  }

  /**
   * Existence is checked up front so a missing object rejects here; the
   * download itself only starts when the returned stream is first read.
   */
  async openObject(name: string, options: CallOptions = {}): Promise<Readable> {
    const path = this.objectPath(name);
    const file = this.file(name);
    try {
      await abortable(() => file.getMetadata(), options.signal);
    } catch (error) {
      if (statusOf(error) === NOT_FOUND) throw new StoreNotFoundError(name);
      throw upstream(`gs open "${path}"`, error);
    }

    const stream = file.createReadStream();
    if (options.signal) addAbortSignal(options.signal, stream);
    return this.common.uncompressedReader(stream);
  }

  async fileExists(name: string, options: CallOptions = {}): Promise<boolean> {
    const path = this.objectPath(name);
    try {
      const [exists] = await abortable(() => this.file(name).exists(), options.signal);
      return exists;
    } catch (error) {
      throw upstream(`gs exists "${path}"`, error);
    }
  }

  async objectAttributes(name: string, options: CallOptions = {}): Promise<ObjectAttributes> {
    const path = this.objectPath(name);
    try {
      const [metadata] = await abortable(() => this.file(name).getMetadata(), options.signal);
      return {
        size: Number(metadata.size ?? 0),
        lastModified: new Date(metadata.updated ?? 0),
      };
    } catch (error) {
      if (statusOf(error) === NOT_FOUND) throw new StoreNotFoundError(name);
      throw upstream(`gs attributes "${path}"`, error);
    }
  }

  async deleteObject(name: string, options: CallOptions = {}): Promise<void> {
    const path = this.objectPath(name);
    try {
      await abortable(() => this.file(name).delete(), options.signal);
    } catch (error) {
      if (statusOf(error) === NOT_FOUND) throw new StoreNotFoundError(name);
      throw upstream(`gs delete "${path}"`, error);
    }
  }

  /** Server-side copy; the bytes are not re-encoded */
  async copyObject(source: string, destination: string, options: CallOptions = {}): Promise<void> {
    const from = this.objectPath(source);
    try {
      await abortable(
        () =>
          this.file(source).copy(this.file(destination), {
            preconditionOpts: this.overwrite ? undefined : { ifGenerationMatch: 0 },
          }),
        options.signal
      );
    } catch (error) {
      const status = statusOf(error);
      if (status === NOT_FOUND) throw new StoreNotFoundError(source);
      if (!this.overwrite && status === PRECONDITION_FAILED) return;
      throw upstream(`gs copy "${from}" to "${this.objectPath(destination)}"`, error);
    }
  }

  async pushLocalFile(localFile: string, toBaseName: string, options?: CallOptions): Promise<void> {
    await this.common.pushLocalFile(this, localFile, toBaseName, options);
  }

  async walk(prefix: string, visit: WalkVisitor, options?: CallOptions): Promise<void> {
    await this.walkFrom(prefix, '', visit, options);
  }

  async walkFrom(
    prefix: string,
    startingPoint: string,
    visit: WalkVisitor,
    options: CallOptions = {}
  ): Promise<void> {
    await this.common.walkFrom(this.listNames, prefix, startingPoint, visit, options.signal);
  }

  iterate(prefix: string, startingPoint = '', options: CallOptions = {}): AsyncIterable<string> {
    return this.common.iterate(this.listNames, prefix, startingPoint, options.signal);
  }

  async listFiles(prefix: string, max: number, options?: CallOptions): Promise<string[]> {
    return this.common.listFiles(this, prefix, max, options);
  }

  async subStore(subFolder: string): Promise<Store> {
    const url = new URL(this.baseUrl.toString());
    url.pathname = `${trimSeparatorSuffix(url.pathname)}/${trimSeparatorPrefix(subFolder)}`;
    const path = this.location.path ? `${this.location.path}/${subFolder}` : subFolder;
    return new GsStore(
      { ...this.location, url, path: trimSeparatorSuffix(trimSeparatorPrefix(path)) },
      this.common.settings,
      this.client
    );
  }

  async clone(overrides?: Partial<Omit<StoreSettings, 'logger'>>): Promise<Store> {
    return new GsStore(this.location, this.common.withOverrides(overrides), this.client);
  }

  async close(): Promise<void> {
    // The client keeps no connection of its own
  }

  private readonly listNames: NameLister = (prefix, startingPoint, signal) =>
    inNameOrder(this.listObjects(prefix, startingPoint, signal), this.common.paths.suffix);

  /** `startOffset` is inclusive, so the full starting point can be sent as is */
  private async *listObjects(
    prefix: string,
    startingPoint: string,
    signal?: AbortSignal
  ): AsyncGenerator<string> {
    const keyPrefix = this.location.path ? `${this.location.path}/` : '';
    let query: GetFilesOptions = {
      prefix: keyPrefix + prefix,
      startOffset: startingPoint ? keyPrefix + startingPoint : undefined,
      autoPaginate: false,
    };

    for (;;) {
      const [files, nextQuery] = await abortable(() => this.bucket.getFiles(query), signal);
      for (const file of files) {
        const name = this.toBaseName(file.name);
        if (name) yield name;
      }
      if (!nextQuery) return;
      query = { ...query, ...nextQuery };
    }
  }
}
