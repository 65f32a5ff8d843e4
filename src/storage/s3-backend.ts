// S3 store (AWS or any S3-compatible endpoint).
//
// Keys are `<path>/<name>[.<extension>]` inside one bucket. Writes stream
// through the multipart uploader while the encoder is still producing.

import { Readable } from 'node:stream';
import { setTimeout as sleep } from 'node:timers/promises';

import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  S3Client,
} from '@aws-sdk/client-s3';
import type { GetObjectCommandOutput } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';

import { uploadConcurrently } from './atomic.js';
import { CommonStore } from './common.js';
import type { ParsedStoreOptions } from './config.js';
import { StoreNotFoundError, upstream } from './errors.js';
import type { S3Location } from './location.js';
import { trimSeparatorPrefix, trimSeparatorSuffix } from './paths.js';
import type {
  CallOptions,
  ObjectAttributes,
  Store,
  StoreSettings,
  WalkVisitor,
  WriteSource,
} from './types.js';
import { inNameOrder, startAfterMarker } from './walk.js';
import type { NameLister } from './walk.js';

export const READ_RETRY_DELAY_MS = 500;

export type S3ReadOptions = ParsedStoreOptions['s3'];

/** Client configured from a parsed location: region, endpoint, path style, static keys */
export function createS3Client(location: S3Location): S3Client {
  return new S3Client({
    region: location.region,
    endpoint: location.endpoint,
    forcePathStyle: location.forcePathStyle,
    credentials: location.credentials,
  });
}

/** HeadObject reports `NotFound`, GetObject `NoSuchKey`; both carry a 404 */
function isMissing(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error.name === 'NotFound' || error.name === 'NoSuchKey') return true;
  if (!('$metadata' in error)) return false;
  const metadata = error.$metadata;
  return (
    typeof metadata === 'object' &&
    metadata !== null &&
    'httpStatusCode' in metadata &&
    metadata.httpStatusCode === 404
  );
}

export class S3Store implements Store {
  readonly kind = 's3' as const;
  readonly baseUrl: URL;
  private readonly common: CommonStore;

  constructor(
    private readonly location: S3Location,
    settings: StoreSettings,
    private readonly readOptions: S3ReadOptions,
    private readonly client: S3Client = createS3Client(location)
  ) {
    this.baseUrl = location.url;
    this.common = new CommonStore('s3', settings, location.path);
  }

  get overwrite(): boolean {
    return this.common.overwrite;
  }

  get bucket(): string {
    return this.location.bucket;
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

    // Best effort: another writer may still land between this check and the upload
    if (!this.overwrite && (await this.fileExists(name, options))) {
      this.common.log.debug({ key }, 'Object exists and overwrite is disabled, skipping write');
      return;
    }

    this.common.log.debug({ bucket: this.bucket, key }, 'Uploading object');
    try {
      await uploadConcurrently({
        signal: options.signal,
        produce: (body, signal) => this.common.compressedCopy(body, source, signal),
        consume: async (body, signal) => {
          const abortController = new AbortController();
          signal.addEventListener('abort', () => abortController.abort(signal.reason), { once: true });
          const upload = new Upload({
            client: this.client,
            params: { Bucket: this.bucket, Key: key, Body: body },
            abortController,
          });
          await upload.done();
        },
      });
    } catch (error) {
      throw upstream(`s3 write "${key}"`, error);
    }
  }

  async openObject(name: string, options: CallOptions = {}): Promise<Readable> {
    const key = this.objectPath(name);
    const { readAttempts, bufferedRead } = this.readOptions;

    let lastError: unknown;
    for (let attempt = 0; attempt < readAttempts; attempt++) {
      if (attempt > 0) {
        this.common.log.debug(
          { err: lastError, attempt, maxAttempts: readAttempts, key },
          'S3 open failed, retrying'
        );
        await sleep(READ_RETRY_DELAY_MS, undefined, { signal: options.signal });
      }

      try {
        const output = await this.client.send(
          new GetObjectCommand({ Bucket: this.bucket, Key: key }),
          { abortSignal: options.signal }
        );
        return this.common.uncompressedReader(await this.bodyOf(output, bufferedRead));
      } catch (error) {
        lastError = error;
      }
    }

    if (isMissing(lastError)) throw new StoreNotFoundError(name);
    throw upstream(
      `s3 open "${key}" (${readAttempts} attempts, buffered read: ${bufferedRead})`,
      lastError
    );
  }

  private async bodyOf(output: GetObjectCommandOutput, buffered: boolean): Promise<Readable> {
    const body = output.Body;
    if (!body) return Readable.from([], { objectMode: false });
    if (!buffered && body instanceof Readable) return body;
    return Readable.from([Buffer.from(await body.transformToByteArray())], { objectMode: false });
  }

  async fileExists(name: string, options: CallOptions = {}): Promise<boolean> {
    const key = this.objectPath(name);
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }), {
        abortSignal: options.signal,
      });
      return true;
    } catch (error) {
      if (isMissing(error)) return false;
      throw upstream(`s3 head "${key}"`, error);
    }
  }

  async objectAttributes(name: string, options: CallOptions = {}): Promise<ObjectAttributes> {
    const key = this.objectPath(name);
    try {
      const output = await this.client.send(
        new HeadObjectCommand({ Bucket: this.bucket, Key: key }),
        { abortSignal: options.signal }
      );
      return {
        size: output.ContentLength ?? 0,
        lastModified: output.LastModified ?? new Date(0),
      };
    } catch (error) {
      if (isMissing(error)) throw new StoreNotFoundError(name);
      throw upstream(`s3 head "${key}"`, error);
    }
  }

  /** AWS answers 204 for missing keys; only some compatible endpoints report a 404 */
  async deleteObject(name: string, options: CallOptions = {}): Promise<void> {
    const key = this.objectPath(name);
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }), {
        abortSignal: options.signal,
      });
    } catch (error) {
      if (isMissing(error)) throw new StoreNotFoundError(name);
      throw upstream(`s3 delete "${key}"`, error);
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
    return new S3Store(
      { ...this.location, url, path: trimSeparatorSuffix(trimSeparatorPrefix(path)) },
      this.common.settings,
      this.readOptions,
      this.client
    );
  }

  async clone(overrides?: Partial<Omit<StoreSettings, 'logger'>>): Promise<Store> {
    return new S3Store(this.location, this.common.withOverrides(overrides), this.readOptions);
  }

  async close(): Promise<void> {
    this.client.destroy();
  }

  private readonly listNames: NameLister = (prefix, startingPoint, signal) =>
    inNameOrder(this.listKeys(prefix, startingPoint, signal), this.common.paths.suffix);

  private async *listKeys(
    prefix: string,
    startingPoint: string,
    signal?: AbortSignal
  ): AsyncGenerator<string> {
    const keyPrefix = this.location.path ? `${this.location.path}/` : '';
    const startAfter = startAfterMarker(keyPrefix, startingPoint);

    let continuationToken: string | undefined;
    do {
      const page = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: keyPrefix + prefix,
          StartAfter: startAfter,
          ContinuationToken: continuationToken,
        }),
        { abortSignal: signal }
      );

      for (const object of page.Contents ?? []) {
        if (!object.Key) continue;
        const name = this.toBaseName(object.Key);
        if (!name) {
          this.common.log.debug({ key: object.Key }, 'Ignoring key with an empty name');
          continue;
        }
        yield name;
      }

      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);
  }
}
