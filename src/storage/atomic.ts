// Write-then-commit helpers.
//
// Local writes land in a uniquely named `.tmp` sibling and are renamed over
// the destination once complete. Cloud writes run the encoder and the upload
// concurrently over one PassThrough; whichever side fails first tears the
// other down.

import { randomInt } from 'node:crypto';
import { once } from 'node:events';
import { createWriteStream } from 'node:fs';
import { link, mkdir, rename, rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import { PassThrough } from 'node:stream';
import type { Writable } from 'node:stream';

/** Suffix reserved for in-flight local writes. Walks never report these files. */
export const TEMP_SUFFIX = '.tmp';

const LETTERS = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ';

export function randomLetters(length: number): string {
  let out = '';
  for (let i = 0; i < length; i++) {
    out += LETTERS.charAt(randomInt(LETTERS.length));
  }
  return out;
}

/** `<destination>.<8 random letters>.tmp`, distinct per concurrent writer */
export function tempPathFor(destination: string): string {
  return `${destination}.${randomLetters(8)}${TEMP_SUFFIX}`;
}

/** Filesystems without hard links report one of these from link(2). */
const LINK_UNSUPPORTED = new Set(['EPERM', 'ENOTSUP', 'EOPNOTSUPP', 'EXDEV', 'ENOSYS']);

export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Publish `tempPath` at `destination` only if nothing is there yet.
 * A hard link fails atomically with EEXIST when the destination exists; where
 * links are unsupported this degrades to a plain rename.
 */
async function linkIfAbsent(tempPath: string, destination: string): Promise<void> {
  try {
    await link(tempPath, destination);
  } catch (error) {
    const code = errnoCode(error);
    if (code === 'EEXIST') return;
    if (code && LINK_UNSUPPORTED.has(code)) {
      await rename(tempPath, destination);
      return;
    }
    throw error;
  }
}

export interface AtomicWriteOptions {
  /** Replace an existing destination (rename) or keep it (link, first writer wins) */
  overwrite: boolean;
}

/**
 * Write `destination` all-or-nothing.
 *
 * `write` fills the temp file stream and must resolve only once it has
 * finished. Publishing the temp file is the commit point. On failure the temp
 * file is removed and the destination is left untouched.
 */
export async function writeAtomically(
  destination: string,
  write: (temp: Writable) => Promise<void>,
  options: AtomicWriteOptions
): Promise<void> {
  await mkdir(dirname(destination), { recursive: true });

  const tempPath = tempPathFor(destination);
  const temp = createWriteStream(tempPath, { flags: 'wx' });
  try {
    await write(temp);
    if (options.overwrite) {
      await rename(tempPath, destination);
      return;
    }
    await linkIfAbsent(tempPath, destination);
  } catch (error) {
    // The stream may still be opening the file; removing it before close could leave it behind
    if (!temp.closed) {
      temp.destroy();
      await once(temp, 'close');
    }
    await rm(tempPath, { force: true });
    throw error;
  }
  await rm(tempPath, { force: true });
}

export interface ConcurrentUploadOptions {
  /** Fills `body` (typically the encoder) and ends it */
  produce: (body: Writable, signal: AbortSignal) => Promise<void>;
  /** Drains `body` into the backend */
  consume: (body: PassThrough, signal: AbortSignal) => Promise<void>;
  signal?: AbortSignal;
}

/**
 * Run producer and consumer concurrently over a shared PassThrough.
 *
 * The first failure aborts the shared signal and destroys the pipe so that
 * neither side stays blocked. Resolves or rejects only after both sides have
 * settled; rejects with the first failure seen.
 */
export async function uploadConcurrently(options: ConcurrentUploadOptions): Promise<void> {
  const controller = new AbortController();
  const body = new PassThrough();

  let failed = false;
  let firstError: unknown;
  const fail = (error: unknown): void => {
    if (!failed) {
      failed = true;
      firstError = error;
    }
    if (!controller.signal.aborted) controller.abort(error);
    if (!body.destroyed) body.destroy(error instanceof Error ? error : new Error(String(error)));
  };

  const onCallerAbort = (): void => fail(options.signal?.reason);
  if (options.signal?.aborted) {
    fail(options.signal.reason);
  } else {
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });
  }

  try {
    await Promise.allSettled([
      options.produce(body, controller.signal).catch(fail),
      options.consume(body, controller.signal).catch(fail),
    ]);
  } finally {
    options.signal?.removeEventListener('abort', onCallerAbort);
  }

  if (failed) throw firstError;
}
