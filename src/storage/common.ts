// Logic shared by every backend.
//
// Backends hold a CommonStore and delegate to it for the pieces that do not
// depend on the storage medium: naming, compression, walk gating, listing and
// push-then-verify.

import { createReadStream } from 'node:fs';
import { unlink } from 'node:fs/promises';
import type { Readable, Writable } from 'node:stream';
import { setTimeout as sleep } from 'node:timers/promises';

import type { Logger } from 'pino';

import { decode, encode, toReadable } from './compression.js';
import { upstream } from './errors.js';
import { PathResolver } from './paths.js';
import type { PathFlavor } from './paths.js';
import type {
  CallOptions,
  Store,
  StoreKind,
  StoreSettings,
  WalkVisitor,
  WriteSource,
} from './types.js';
import { collectNames, gatedNames, visitNames } from './walk.js';
import type { NameLister } from './walk.js';

export class CommonStore {
  readonly paths: PathResolver;
  readonly log: Logger;

  constructor(
    readonly kind: StoreKind,
    readonly settings: Readonly<StoreSettings>,
    basePath: string,
    flavor: PathFlavor = 'posix'
  ) {
    this.paths = new PathResolver(basePath, settings.extension, flavor);
    this.log = settings.logger.child({ store: kind });
  }

  get overwrite(): boolean {
    return this.settings.overwrite;
  }

  /** Settings snapshot with overrides applied, for `clone()` */
  withOverrides(overrides: Partial<Omit<StoreSettings, 'logger'>> = {}): StoreSettings {
    return Object.freeze({ ...this.settings, ...overrides });
  }

  /** Encode `source` into `destination`, honoring codec and write hooks */
  async compressedCopy(destination: Writable, source: WriteSource, signal?: AbortSignal): Promise<void> {
    await encode(destination, toReadable(source), this.settings.compression, this.settings.hooks, signal);
  }

  /** Decoding view over a stored byte stream */
  uncompressedReader(source: Readable): Readable {
    return decode(source, this.settings.compression, this.settings.hooks);
  }

  iterate(
    lister: NameLister,
    prefix: string,
    startingPoint: string,
    signal?: AbortSignal
  ): AsyncGenerator<string> {
    return gatedNames(lister, prefix, startingPoint, `${this.kind} walk "${prefix}"`, signal);
  }

  async walkFrom(
    lister: NameLister,
    prefix: string,
    startingPoint: string,
    visit: WalkVisitor,
    signal?: AbortSignal
  ): Promise<void> {
    this.log.debug({ prefix, startingPoint }, 'Walking objects');
    await visitNames(this.iterate(lister, prefix, startingPoint, signal), visit);
  }

  async listFiles(store: Store, prefix: string, max: number, options?: CallOptions): Promise<string[]> {
    return collectNames((visit) => store.walk(prefix, visit, options), max);
  }

  /** Copy by reading through the decoder and writing through the encoder */
  async copyThrough(store: Store, source: string, destination: string, options?: CallOptions): Promise<void> {
    const reader = await store.openObject(source, options);
    try {
      await store.writeObject(destination, reader, options);
    } finally {
      reader.destroy();
    }
  }

  /**
   * Upload a local file, then delete it.
   *
   * With `pushVerifyDelayMs` set, waits that long after the upload and checks
   * the object is visible; if it is not, uploads once more. The local file is
   * only removed after that, since its deletion cannot be undone.
   */
  async pushLocalFile(
    store: Store,
    localFile: string,
    toBaseName: string,
    options: CallOptions = {}
  ): Promise<void> {
    await this.pushOnce(store, localFile, toBaseName, options);

    const delay = this.settings.pushVerifyDelayMs;
    if (delay > 0) {
      await sleep(delay, undefined, { signal: options.signal });
      const exists = await store.fileExists(toBaseName, options);
      if (!exists) {
        this.log.warn(
          { name: toBaseName, delayMs: delay },
          'Pushed object not visible after delay, pushing again'
        );
        await this.pushOnce(store, localFile, toBaseName, options);
      }
    }

    await unlink(localFile);
  }

  private async pushOnce(
    store: Store,
    localFile: string,
    toBaseName: string,
    options: CallOptions
  ): Promise<void> {
    try {
      await store.writeObject(toBaseName, createReadStream(localFile), options);
    } catch (error) {
      throw upstream(`writing "${localFile}" to "${store.objectPath(toBaseName)}"`, error);
    }
  }
}
