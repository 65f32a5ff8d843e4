// Azure Blob Storage store.
//
// `az://<account>.<container>/<path>`, authenticated with a shared account key.
// Listing has no native start offset, so resuming a walk filters client-side.

import { Readable } from 'node:stream';

import { BlobServiceClient, StorageSharedKeyCredential } from '@azure/storage-blob';
import type { BlockBlobClient, ContainerClient } from '@azure/storage-blob';

import { uploadConcurrently } from './atomic.js';
import { CommonStore } from './common.js';
import { StoreInvalidUsageError, StoreNotFoundError, upstream } from './errors.js';
import type { AzureLocation } from './location.js';
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

export const ACCOUNT_KEY_ENV = 'AZURE_STORAGE_KEY';

/** Size of the rotating upload buffers */
const UPLOAD_BUFFER_SIZE = 1024 * 1024;
const UPLOAD_MAX_BUFFERS = 3;
const LIST_PAGE_SIZE = 5000;

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('statusCode' in error && typeof error.statusCode === 'number') return error.statusCode;
  return undefined;
}

/** Container client for a location. The key comes from `accountKey`, else AZURE_STORAGE_KEY. */
export function createContainerClient(location: AzureLocation, accountKey?: string): ContainerClient {
  const key = accountKey ?? process.env[ACCOUNT_KEY_ENV];
  if (!key) {
    throw new StoreInvalidUsageError(
      `specify azure access storage key with the azure.accountKey option or env var: ${ACCOUNT_KEY_ENV}`
    );
  }

  const credential = new StorageSharedKeyCredential(location.account, key);
  const service = new BlobServiceClient(`https://${location.account}.blob.core.windows.net`, credential);
  return service.getContainerClient(location.container);
}

export class AzureStore implements Store {
  readonly kind = 'az' as const;
  readonly baseUrl: URL;
  private readonly common: CommonStore;

  constructor(
    private readonly location: AzureLocation,
    settings: StoreSettings,
    private readonly accountKey?: string,
    private readonly container: ContainerClient = createContainerClient(location, accountKey)
  ) {
    this.baseUrl = location.url;
    this.common = new CommonStore('az', settings, location.path);
  }

  get overwrite(): boolean {
    return this.common.overwrite;
  }

  private blob(name: string): BlockBlobClient {
    return this.container.getBlockBlobClient(this.objectPath(name));
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

  /**
   * Without overwrite the commit is conditional on the blob not existing
   * (`If-None-Match: *`); losing that race (409/412) is a successful no-op.
   */
  async writeObject(name: string, source: WriteSource, options: CallOptions = {}): Promise<void> {
    const path = this.objectPath(name);
    const blob = this.blob(name);

    this.common.log.debug({ container: this.location.container, path }, 'Uploading object');
    try {
      await uploadConcurrently({
        signal: options.signal,
        produce: (body, signal) => this.common.compressedCopy(body, source, signal),
        consume: async (body, signal) => {
          await blob.uploadStream(body, UPLOAD_BUFFER_SIZE, UPLOAD_MAX_BUFFERS, {
            abortSignal: signal,
            blobHTTPHeaders: {
              blobContentType: 'application/octet-stream',
              blobCacheControl: 'public, max-age=86400',
            },
            conditions: this.overwrite ? undefined : { ifNoneMatch: '*' },
          });
        },
      });
    } catch (error) {
      const status = statusOf(error);
      if (!this.overwrite && (status === 409 || status === 412)) {
        this.common.log.debug({ path }, 'Object exists and overwrite is disabled, skipping write');
        return;
      }
      throw upstream(`az write "${path}"`, error);
    }
  }

  async openObject(name: string, options: CallOptions = {}): Promise<Readable> {
    const path = this.objectPath(name);
    try {
      const response = await this.blob(name).download(0, undefined, { abortSignal: options.signal });
      const body = response.readableStreamBody;
      if (!body) return this.common.uncompressedReader(Readable.from([], { objectMode: false }));
      return this.common.uncompressedReader(body instanceof Readable ? body : new Readable().wrap(body));
    } catch (error) {
      if (statusOf(error) === 404) throw new StoreNotFoundError(name);
      throw upstream(`az open "${path}"`, error);
    }
  }

  async fileExists(name: string, options: CallOptions = {}): Promise<boolean> {
    const path = this.objectPath(name);
    try {
      return await this.blob(name).exists({ abortSignal: options.signal });
    } catch (error) {
      throw upstream(`az exists "${path}"`, error);
    }
  }

  async objectAttributes(name: string, options: CallOptions = {}): Promise<ObjectAttributes> {
    const path = this.objectPath(name);
    try {
      const properties = await this.blob(name).getProperties({ abortSignal: options.signal });
      return {
        size: properties.contentLength ?? 0,
        lastModified: properties.lastModified ?? new Date(0),
      };
    } catch (error) {
      if (statusOf(error) === 404) throw new StoreNotFoundError(name);
      throw upstream(`az properties "${path}"`, error);
    }
  }

  async deleteObject(name: string, options: CallOptions = {}): Promise<void> {
    const path = this.objectPath(name);
    try {
      await this.blob(name).delete({ abortSignal: options.signal });
    } catch (error) {
      if (statusOf(error) === 404) throw new StoreNotFoundError(name);
      throw upstream(`az delete "${path}"`, error);
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
    const url = new URL(this.baseUrl.toString());
    url.pathname = `${trimSeparatorSuffix(url.pathname)}/${trimSeparatorPrefix(subFolder)}`;
    const path = this.location.path ? `${this.location.path}/${subFolder}` : subFolder;
    return new AzureStore(
      { ...this.location, url, path: trimSeparatorSuffix(trimSeparatorPrefix(path)) },
      this.common.settings,
      this.accountKey,
      this.container
    );
  }

  async clone(overrides?: Partial<Omit<StoreSettings, 'logger'>>): Promise<Store> {
    return new AzureStore(this.location, this.common.withOverrides(overrides), this.accountKey);
  }

  async close(): Promise<void> {
    // HTTP connections are pooled by the SDK
  }

  private readonly listNames: NameLister = (prefix, _startingPoint, signal) =>
    inNameOrder(this.listBlobs(prefix, signal), this.common.paths.suffix);

  private async *listBlobs(prefix: string, signal?: AbortSignal): AsyncGenerator<string> {
    const keyPrefix = this.location.path ? `${this.location.path}/` : '';
    const pages = this.container
      .listBlobsFlat({ prefix: keyPrefix + prefix, abortSignal: signal })
      .byPage({ maxPageSize: LIST_PAGE_SIZE });

    for await (const page of pages) {
      for (const item of page.segment.blobItems) {
        const name = this.toBaseName(item.name);
        if (name) yield name;
      }
    }
  }
}
