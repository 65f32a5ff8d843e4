// In-memory store.
//
// Full implementation of the store contract over a Map, for tests and for
// code that needs a store without touching disk or network. Sub-stores and
// clones share the same Map, the way cloud sub-stores share a client.

import { Readable, Writable } from 'node:stream';

import { CommonStore } from './common.js';
import { StoreNotFoundError } from './errors.js';
import { trimSeparatorPrefix, trimSeparatorSuffix } from './paths.js';
import type {
  CallOptions,
  ObjectAttributes,
  Store,
  StoreSettings,
  WalkVisitor,
  WriteSource,
} from './types.js';
import { compareNames } from './walk.js';
import type { NameLister } from './walk.js';

interface MemoryObject {
  bytes: Buffer;
  lastModified: Date;
}

export type MemoryData = Map<string, MemoryObject>;

export class MemoryStore implements Store {
  readonly kind = 'memory' as const;
  readonly baseUrl: URL;
  private readonly common: CommonStore;
  private readonly data: MemoryData;

  constructor(baseUrl: URL, settings: StoreSettings, data: MemoryData = new Map()) {
    this.baseUrl = baseUrl;
    this.data = data;
    this.common = new CommonStore('memory', settings, trimSeparatorPrefix(baseUrl.pathname));
  }

  get overwrite(): boolean {
    return this.common.overwrite;
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
    const key = this.objectPath(name);
    if (!this.overwrite && this.data.has(key)) return;

    const chunks: Buffer[] = [];
    const sink = new Writable({
      write(chunk: Buffer, _encoding, done) {
        chunks.push(chunk);
        done();
      },
    });
    await this.common.compressedCopy(sink, source, options.signal);

    // Re-checked at commit: a concurrent writer may have landed while encoding
    if (!this.overwrite && this.data.has(key)) return;
    this.data.set(key, { bytes: Buffer.concat(chunks), lastModified: new Date() });
  }

  async openObject(name: string): Promise<Readable> {
    const object = this.data.get(this.objectPath(name));
    if (!object) throw new StoreNotFoundError(name);
    return this.common.uncompressedReader(Readable.from([object.bytes], { objectMode: false }));
  }

  async fileExists(name: string): Promise<boolean> {
    return this.data.has(this.objectPath(name));
  }

  async objectAttributes(name: string): Promise<ObjectAttributes> {
    const object = this.data.get(this.objectPath(name));
    if (!object) throw new StoreNotFoundError(name);
    return { size: object.bytes.length, lastModified: object.lastModified };
  }

  async deleteObject(name: string): Promise<void> {
    if (!this.data.delete(this.objectPath(name))) throw new StoreNotFoundError(name);
  }

  async copyObject(source: string, destination: string): Promise<void> {
    const object = this.data.get(this.objectPath(source));
    if (!object) throw new StoreNotFoundError(source);
    const key = this.objectPath(destination);
    if (!this.overwrite && this.data.has(key)) return;
    this.data.set(key, { ...object, lastModified: new Date() });
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
    return new MemoryStore(url, this.common.settings, this.data);
  }

  async clone(overrides?: Partial<Omit<StoreSettings, 'logger'>>): Promise<Store> {
    return new MemoryStore(this.baseUrl, this.common.withOverrides(overrides), this.data);
  }

  async close(): Promise<void> {
    // Data stays reachable through sibling stores sharing the Map
  }

  private readonly listNames: NameLister = (prefix) => this.snapshot(prefix);

  /** Sorted snapshot; the starting point is applied by the shared gate */
  private async *snapshot(prefix: string): AsyncGenerator<string> {
    const root = this.common.paths.basePath ? `${this.common.paths.basePath}/` : '';
    const names = [...this.data.keys()]
      .filter((key) => key.startsWith(root))
      .map((key) => this.toBaseName(key))
      .filter((name) => name.startsWith(prefix))
      .sort(compareNames);
    yield* names;
  }
}
