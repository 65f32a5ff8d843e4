// Local filesystem store.
//
// Objects are plain files under a base directory; nested names become nested
// directories. Writes go through a temp file and are published atomically.
// This is the one backend where partial writes are observable, so walks skip
// the `.tmp` files of writes still in flight.

import type { Dirent } from 'node:fs';
import { mkdir, open, readdir, stat, unlink } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { Readable } from 'node:stream';
import { pathToFileURL } from 'node:url';

import { TEMP_SUFFIX, errnoCode, writeAtomically } from './atomic.js';
import { CommonStore } from './common.js';
import { StoreInvalidUsageError, StoreNotFoundError, upstream } from './errors.js';
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

interface DirectoryChild {
  /** Sort key: the base name for files, `<relative>/` for directories */
  key: string;
  relative: string;
  directory: boolean;
}

export class LocalStore implements Store {
  readonly kind = 'local' as const;
  readonly baseUrl: URL;
  private readonly basePath: string;
  private readonly common: CommonStore;
  private initialized = false;

  constructor(basePath: string, settings: StoreSettings) {
    this.basePath = resolve(basePath);
    this.baseUrl = pathToFileURL(this.basePath);
    this.common = new CommonStore('local', settings, this.basePath, 'native');
  }

  get overwrite(): boolean {
    return this.common.overwrite;
  }

  /**
   * Make sure the base directory exists.
   * Throws StoreInvalidUsageError when the base path is a file.
   */
  async ensureDir(): Promise<this> {
    if (this.initialized) return this;

    let isDirectory: boolean;
    try {
      isDirectory = (await stat(this.basePath)).isDirectory();
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') throw upstream(`local stat "${this.basePath}"`, error);
      await mkdir(this.basePath, { recursive: true });
      isDirectory = true;
    }

    if (!isDirectory) {
      throw new StoreInvalidUsageError(
        `base path "${this.basePath}" is a file, expecting it to be a directory`
      );
    }
    this.initialized = true;
    return this;
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
    const destination = this.objectPath(name);

    // Skips the encoding work; writeAtomically still refuses to clobber a concurrent winner
    if (!this.overwrite && (await this.fileExists(name))) {
      this.common.log.debug({ name }, 'Object exists and overwrite is disabled, skipping write');
      return;
    }

    this.common.log.debug({ path: destination }, 'Writing object');
    try {
      await writeAtomically(
        destination,
        (temp) => this.common.compressedCopy(temp, source, options.signal),
        { overwrite: this.overwrite }
      );
    } catch (error) {
      throw upstream(`local write "${destination}"`, error);
    }
  }

  async openObject(name: string, options: CallOptions = {}): Promise<Readable> {
    const path = this.objectPath(name);
    options.signal?.throwIfAborted();

    this.common.log.debug({ path }, 'Opening object');
    try {
      const handle = await open(path, 'r');
      return this.common.uncompressedReader(handle.createReadStream());
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') throw new StoreNotFoundError(name);
      throw upstream(`local open "${path}"`, error);
    }
  }

  async fileExists(name: string): Promise<boolean> {
    const path = this.objectPath(name);
    try {
      return (await stat(path)).isFile();
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') return false;
      throw upstream(`local stat "${path}"`, error);
    }
  }

  async objectAttributes(name: string): Promise<ObjectAttributes> {
    const path = this.objectPath(name);
    try {
      const info = await stat(path);
      return { size: info.size, lastModified: info.mtime };
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') throw new StoreNotFoundError(name);
      throw upstream(`local stat "${path}"`, error);
    }
  }

  async deleteObject(name: string): Promise<void> {
    const path = this.objectPath(name);
    try {
      await unlink(path);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') throw new StoreNotFoundError(name);
      throw upstream(`local delete "${path}"`, error);
    }
  }

  async copyObject(source: string, destination: string, options?: CallOptions): Promise<void> {
    await this.common.copyThrough(this, source, destination, options);
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
    return new LocalStore(join(this.basePath, subFolder), this.common.settings).ensureDir();
  }

  async clone(overrides?: Partial<Omit<StoreSettings, 'logger'>>): Promise<Store> {
    return new LocalStore(this.basePath, this.common.withOverrides(overrides)).ensureDir();
  }

  async close(): Promise<void> {
    // Nothing held open between calls
  }

  /**
   * Names under `prefix`, in order.
   *
   * A prefix that stops mid-segment (`0000` selecting `00001`, `00002`) walks
   * its parent directory and filters by string prefix instead of entering a
   * directory named after it.
   */
  private readonly listNames: NameLister = (prefix) => {
    const cut = prefix.lastIndexOf('/');
    return this.listDirectory(cut === -1 ? '' : prefix.slice(0, cut), prefix);
  };

  private async *listDirectory(relative: string, prefix: string): AsyncGenerator<string> {
    const directory = relative ? join(this.basePath, relative) : this.basePath;

    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') return;
      throw error;
    }

    const children: DirectoryChild[] = [];
    for (const entry of entries) {
      const childRelative = relative ? `${relative}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        const key = `${childRelative}/`;
        if (key.startsWith(prefix) || prefix.startsWith(key)) {
          children.push({ key, relative: childRelative, directory: true });
        }
      } else if (entry.isFile() && !entry.name.endsWith(TEMP_SUFFIX)) {
        const key = this.toBaseName(join(this.basePath, childRelative));
        if (key.startsWith(prefix)) {
          children.push({ key, relative: childRelative, directory: false });
        }
      }
    }

    // Directory keys end in `/`, so a depth-first walk in key order is globally sorted
    children.sort((a, b) => compareNames(a.key, b.key));

    for (const child of children) {
      if (child.directory) {
        yield* this.listDirectory(child.relative, prefix);
      } else {
        yield child.key;
      }
    }
  }
}
