// Location descriptor parsing.
//
//   /abs/or/relative/path         local filesystem
//   file:///abs/path              local filesystem
//   s3://bucket/path?region=…     S3 (or an S3-compatible endpoint)
//   gs://bucket/path?project=…    Google Cloud Storage
//   az://account.container/path   Azure Blob Storage
//   memory://name/path            in-process store

import { StoreInvalidUsageError } from './errors.js';
import { trimSeparatorPrefix, trimSeparatorSuffix } from './paths.js';

export interface LocalLocation {
  kind: 'local';
  path: string;
}

export interface MemoryLocation {
  kind: 'memory';
  url: URL;
}

export interface S3Location {
  kind: 's3';
  url: URL;
  bucket: string;
  /** Key prefix inside the bucket, without leading or trailing `/` */
  path: string;
  region: string;
  /** Custom endpoint (MinIO, Ceph, LocalStack...), always path-style */
  endpoint?: string;
  forcePathStyle: boolean;
  credentials?: { accessKeyId: string; secretAccessKey: string };
}

export interface GsLocation {
  kind: 'gs';
  url: URL;
  bucket: string;
  path: string;
  /** Project billed for requester-pays buckets */
  userProject?: string;
}

export interface AzureLocation {
  kind: 'az';
  url: URL;
  account: string;
  container: string;
  path: string;
}

export type Location = LocalLocation | MemoryLocation | S3Location | GsLocation | AzureLocation;

const SCHEME = /^([a-zA-Z][a-zA-Z0-9+.-]*):\/\//;

/**
 * Parse a base location. The location is always a directory and must not end
 * with `/`. Throws StoreInvalidUsageError on anything malformed.
 */
export function parseLocation(raw: string): Location {
  if (raw === '') {
    throw new StoreInvalidUsageError('location must not be empty');
  }
  if (raw.endsWith('/')) {
    throw new StoreInvalidUsageError(`location "${raw}" must not end with "/"`);
  }

  const scheme = SCHEME.exec(raw)?.[1]?.toLowerCase();
  if (scheme === undefined) {
    return { kind: 'local', path: raw };
  }

  let url: URL;
  try {
    url = new URL(raw);
  } catch (error) {
    throw new StoreInvalidUsageError(
      `location "${raw}" is not a valid URL: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  switch (scheme) {
    case 'file':
      return { kind: 'local', path: decodeURIComponent(url.pathname) };
    case 'memory':
      return { kind: 'memory', url };
    case 's3':
      return parseS3(url);
    case 'gs':
      return parseGs(url);
    case 'az':
      return parseAzure(url);
    default:
      throw new StoreInvalidUsageError(
        `unsupported location scheme "${scheme}", expected a local path, file://, s3://, gs://, az:// or memory://`
      );
  }
}

/** Decoded path segments of a URL, empty segments dropped */
function pathSegments(url: URL): string[] {
  return url.pathname
    .split('/')
    .filter((segment) => segment !== '')
    .map((segment) => decodeURIComponent(segment));
}

/**
 * A host with a port is always an endpoint. A dotted host is an endpoint too,
 * unless `infer_aws_endpoint` says the dots belong to the bucket name.
 */
export function hasCustomEndpoint(url: URL): boolean {
  if (url.port !== '') return true;
  if (!url.hostname.includes('.')) return false;
  return !url.searchParams.get('infer_aws_endpoint');
}

function parseS3(url: URL): S3Location {
  const region = url.searchParams.get('region') ?? '';
  if (!region) {
    throw new StoreInvalidUsageError('specify s3 bucket like: s3://bucket/path?region=us-east-1');
  }

  const segments = pathSegments(url);
  let bucket = url.hostname;
  let endpoint: string | undefined;
  let forcePathStyle = false;

  if (hasCustomEndpoint(url)) {
    const first = segments.shift();
    if (!first) {
      throw new StoreInvalidUsageError(
        `s3 endpoint location "${url.toString()}" is missing the bucket, expecting s3://host:port/bucket/path`
      );
    }
    bucket = first;
    endpoint = `${url.searchParams.get('insecure') ? 'http' : 'https'}://${url.host}`;
    forcePathStyle = true;
  }

  if (!bucket) {
    throw new StoreInvalidUsageError(`s3 location "${url.toString()}" is missing the bucket`);
  }

  const accessKeyId = url.searchParams.get('access_key_id') ?? '';
  const secretAccessKey = url.searchParams.get('secret_access_key') ?? '';

  return {
    kind: 's3',
    url,
    bucket,
    path: segments.join('/'),
    region,
    endpoint,
    forcePathStyle,
    credentials: accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey } : undefined,
  };
}

function parseGs(url: URL): GsLocation {
  if (!url.hostname) {
    throw new StoreInvalidUsageError(`gs location "${url.toString()}" is missing the bucket`);
  }
  return {
    kind: 'gs',
    url,
    bucket: url.hostname,
    path: trimSeparatorSuffix(trimSeparatorPrefix(decodeURIComponent(url.pathname))),
    userProject: url.searchParams.get('project') || undefined,
  };
}

function parseAzure(url: URL): AzureLocation {
  const parts = url.hostname.split('.');
  const [account, container] = parts;
  if (parts.length !== 2 || !account || !container) {
    throw new StoreInvalidUsageError('specify azure account name and container like: az://account.container/path');
  }
  return {
    kind: 'az',
    url,
    account,
    container,
    path: trimSeparatorSuffix(trimSeparatorPrefix(decodeURIComponent(url.pathname))),
  };
}
