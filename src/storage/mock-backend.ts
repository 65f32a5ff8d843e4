// Scripted store double.
//
// Objects are kept uncompressed by exact name. Every operation can be replaced
// per test through `overrides`; a file set with the content "err" fails on
// open and on existence checks.

import { readFile, unlink } from 'node:fs/promises';
import { Readable } from 'node:stream';
import { buffer } from 'node:stream/consumers';

import pino from 'pino';
import type { Logger } from 'pino';

import { toReadable } from './compression.js';
import { StoreNotFoundError, upstream } from './errors.js';
import type {
  CallOptions,
  ObjectAttributes,
  Store,
  StoreSettings,
  WalkVisitor,
  WriteSource,
} from './types.js';
import { collectNames, compareNames, gatedNames, visitNames } from './walk.js';

const ERROR_CONTENT = 'err';

/** Operations a test may script; each replaces the built-in behavior entirely. */
export interface MockStoreOverrides {
  openObject?: (name: string) => Promise<Readable>;
  writeObject?: (name: string, source: Readable) => Promise<void>;
  copyObject?: (source: string, destination: string) => Promise<void>;
  deleteObject?: (name: string) => Promise<void>;
  fileExists?: (name: string) => Promise<boolean>;
  listFiles?: (prefix: string, max: number) => Promise<string[]>;
  walk?: (prefix: string, visit: WalkVisitor) => Promise<void>;
  pushLocalFile?: (localFile: string, toBaseName: string) => Promise<void>;
}

export interface MockStoreOptions {
  overwrite?: boolean;
  overrides?: MockStoreOverrides;
  logger?: Logger;
}

export class MockStore implements Store {
  readonly kind = 'mock' as const;
  readonly baseUrl = new URL('mock:///mock');
  overwrite: boolean;
  overrides: MockStoreOverrides;
  private readonly files = new Map<string, Buffer>();
  private readonly modified = new Map<string, Date>();
  private readonly log: Logger;

  constructor(options: MockStoreOptions = {}) {
    this.overwrite = options.overwrite ?? false;
    this.overrides = options.overrides ?? {};
    this.log = (options.logger ?? pino({ level: 'silent' })).child({ store: 'mock' });
  }

  /** Set the content of a file directly, bypassing overwrite rules. */
  setFile(name: string, content: string | Uint8Array): void {
    const bytes = Buffer.from(content);
    this.log.debug(
      { name, contentLength: bytes.length, isError: bytes.toString() === ERROR_CONTENT },
      'Adding file'
    );
    this.files.set(name, bytes);
    this.modified.set(name, new Date());
  }

  /** Current content of a file, undefined when absent. */
  getFile(name: string): Buffer | undefined {
    return this.files.get(name);
  }

  objectPath(name: string): string {
    return name;
  }

  objectUrl(name: string): string {
    return name;
  }

  toBaseName(path: string): string {
    return path;
  }

  async writeObject(name: string, source: WriteSource): Promise<void> {
    const readable = toReadable(source);
    if (this.overrides.writeObject) return this.overrides.writeObject(name, readable);

    if (this.files.has(name) && !this.overwrite) {
      this.log.debug({ name }, 'Object exists and overwrite is disabled, skipping write');
      readable.destroy();
      return;
    }
    this.files.set(name, await buffer(readable));
    this.modified.set(name, new Date());
  }

  async openObject(name: string): Promise<Readable> {
    if (this.overrides.openObject) return this.overrides.openObject(name);

    const content = this.files.get(name);
    if (!content) throw new StoreNotFoundError(name);
    if (content.toString() === ERROR_CONTENT) {
      throw upstream(`mock open "${name}"`, new Error(`${name} errored`));
    }
    return Readable.from([content], { objectMode: false });
  }

  async fileExists(name: string): Promise<boolean> {
    if (this.overrides.fileExists) return this.overrides.fileExists(name);

    const content = this.files.get(name);
    if (!content) return false;
    if (content.toString() === ERROR_CONTENT) {
      throw upstream(`mock stat "${name}"`, new Error(`${name} errored`));
    }
    return true;
  }

  async objectAttributes(name: string): Promise<ObjectAttributes> {
    const content = this.files.get(name);
    const lastModified = this.modified.get(name);
    if (!content || !lastModified) throw new StoreNotFoundError(name);
    return { size: content.length, lastModified };
  }

  async deleteObject(name: string): Promise<void> {
    if (this.overrides.deleteObject) return this.overrides.deleteObject(name);
    this.files.delete(name);
    this.modified.delete(name);
  }

  async copyObject(source: string, destination: string): Promise<void> {
    if (this.overrides.copyObject) return this.overrides.copyObject(source, destination);

    const reader = await this.openObject(source);
    await this.writeObject(destination, reader);
  }

  async pushLocalFile(localFile: string, toBaseName: string): Promise<void> {
    if (this.overrides.pushLocalFile) return this.overrides.pushLocalFile(localFile, toBaseName);

    await this.writeObject(toBaseName, await readFile(localFile));
    await unlink(localFile);
  }

  async walk(prefix: string, visit: WalkVisitor, options?: CallOptions): Promise<void> {
    if (this.overrides.walk) return this.overrides.walk(prefix, visit);
    await this.walkFrom(prefix, '', visit, options);
  }

  async walkFrom(
    prefix: string,
    startingPoint: string,
    visit: WalkVisitor,
    options: CallOptions = {}
  ): Promise<void> {
    await visitNames(this.iterate(prefix, startingPoint, options), visit);
  }

  iterate(prefix: string, startingPoint = '', options: CallOptions = {}): AsyncIterable<string> {
    const names = [...this.files.keys()].filter((name) => name.startsWith(prefix)).sort(compareNames);
    return gatedNames(
      async function* () {
        yield* names;
      },
      prefix,
      startingPoint,
      `mock walk "${prefix}"`,
      options.signal
    );
  }

  async listFiles(prefix: string, max: number): Promise<string[]> {
    if (this.overrides.listFiles) return this.overrides.listFiles(prefix, max);
    return collectNames((visit) => this.walk(prefix, visit), max);
  }

  /** Copy of this double with every file re-keyed under `subFolder/` */
  async subStore(subFolder: string): Promise<Store> {
    const sub = new MockStore({ overwrite: this.overwrite, overrides: { ...this.overrides }, logger: this.log });
    for (const [name, content] of this.files) {
      sub.setFile(`${subFolder}/${name}`, content);
    }
    return sub;
  }

  async clone(overrides?: Partial<Omit<StoreSettings, 'logger'>>): Promise<Store> {
    const copy = new MockStore({
      overwrite: overrides?.overwrite ?? this.overwrite,
      overrides: { ...this.overrides },
      logger: this.log,
    });
    for (const [name, content] of this.files) copy.setFile(name, content);
    return copy;
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}
