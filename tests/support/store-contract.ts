// Behaviour every Store implementation must share. Each backend's test file
// calls `storeContract` with a factory building a fresh, empty store.

import { existsSync } from 'node:fs';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join, sep } from 'node:path';
import { text } from 'node:stream/consumers';

import { describe, expect, it } from 'vitest';

import { STOP, StopIterationError } from '@/storage/index.js';
import type { CompressionType, Store, StoreOptions } from '@/storage/index.js';

export type StoreFactory = (options?: StoreOptions) => Promise<Store>;

export async function readText(store: Store, name: string): Promise<string> {
  return text(await store.openObject(name));
}

export async function walkNames(store: Store, prefix: string, startingPoint = ''): Promise<string[]> {
  const names: string[] = [];
  await store.walkFrom(prefix, startingPoint, (name) => {
    names.push(name);
  });
  return names;
}

async function writeAll(store: Store, names: string[]): Promise<void> {
  for (const name of names) {
    await store.writeObject(name, `content of ${name}`);
  }
}

export function storeContract(create: StoreFactory): void {
  describe('store contract', () => {
    describe('naming', () => {
      it('should invert objectPath with toBaseName', async () => {
        const store = await create({ extension: 'dbin.zst' });
        const names = ['a', 'a/b/c', '0000000001', 'with space', 'ü-unicode'];
        // a backslash can only live inside a name where it is not a path separator
        if (sep === '/') names.push('a\\b');
        for (const name of names) {
          expect(store.toBaseName(store.objectPath(name))).toBe(name);
        }
      });

      it('should append the extension to object paths and URLs', async () => {
        const store = await create({ extension: 'jsonl.gz' });
        expect(store.objectPath('a/b').endsWith('a/b.jsonl.gz')).toBe(true);
        expect(store.objectUrl('a/b').endsWith('/a/b.jsonl.gz')).toBe(true);
      });
    });

    describe('writeObject() / openObject()', () => {
      for (const compression of ['none', 'gzip', 'zstd'] satisfies CompressionType[]) {
        it(`should round-trip content with ${compression} compression`, async () => {
          const store = await create({ compression, extension: 'bin' });
          const content = 'line of text\n'.repeat(500);

          await store.writeObject('blocks/0001', content);

          expect(await readText(store, 'blocks/0001')).toBe(content);
        });
      }

      it('should accept a stream or bytes as the source', async () => {
        const store = await create();
        await store.writeObject('bytes', new Uint8Array([104, 105]));
        await store.writeObject('stream', await store.openObject('bytes'));

        expect(await readText(store, 'bytes')).toBe('hi');
        expect(await readText(store, 'stream')).toBe('hi');
      });

      it('should reject with NotFound for a name never written', async () => {
        const store = await create();
        await expect(store.openObject('never-written')).rejects.toMatchObject({
          code: 'STORE_NOT_FOUND',
        });
      });

      it('should keep the first content when overwrite is disabled', async () => {
        const store = await create({ overwrite: false });
        await store.writeObject('x', 'first');
        await store.writeObject('x', 'second');

        expect(await readText(store, 'x')).toBe('first');
      });

      it('should replace the content when overwrite is enabled', async () => {
        const store = await create({ overwrite: true });
        await store.writeObject('x', 'first');
        await store.writeObject('x', 'second');

        expect(await readText(store, 'x')).toBe('second');
      });

      it('should leave one complete object after concurrent writes', async () => {
        const store = await create({ overwrite: false, compression: 'gzip' });
        const contents = ['alpha'.repeat(1000), 'bravo'.repeat(1000), 'charlie'.repeat(1000)];

        await Promise.all(contents.map((content) => store.writeObject('shared', content)));

        expect(contents).toContain(await readText(store, 'shared'));
        expect(await store.listFiles('', -1)).toEqual(['shared']);
      });
    });

    describe('metering hooks', () => {
      it('should report uncompressed and compressed byte counts', async () => {
        const counts = { uncompressedWrite: 0, compressedWrite: 0, compressedRead: 0, uncompressedRead: 0 };
        const store = await create({
          compression: 'gzip',
          hooks: {
            uncompressedWrite: (n) => (counts.uncompressedWrite += n),
            compressedWrite: (n) => (counts.compressedWrite += n),
            compressedRead: (n) => (counts.compressedRead += n),
            uncompressedRead: (n) => (counts.uncompressedRead += n),
          },
        });
        const content = 'metered '.repeat(200);

        await store.writeObject('m', content);
        await readText(store, 'm');

        const { size } = await store.objectAttributes('m');
        expect(counts.uncompressedWrite).toBe(content.length);
        expect(counts.uncompressedRead).toBe(content.length);
        expect(counts.compressedWrite).toBe(size);
        expect(counts.compressedRead).toBe(size);
      });
    });

    describe('fileExists() / objectAttributes() / deleteObject()', () => {
      it('should report existence', async () => {
        const store = await create();
        await store.writeObject('present', 'here');

        expect(await store.fileExists('present')).toBe(true);
        expect(await store.fileExists('absent')).toBe(false);
      });

      it('should return the stored size and a modification date', async () => {
        const store = await create();
        await store.writeObject('sized', '12345');

        const attributes = await store.objectAttributes('sized');
        expect(attributes.size).toBe(5);
        expect(attributes.lastModified).toBeInstanceOf(Date);
      });

      it('should reject objectAttributes with NotFound for a missing object', async () => {
        const store = await create();
        await expect(store.objectAttributes('absent')).rejects.toMatchObject({ code: 'STORE_NOT_FOUND' });
      });

      it('should delete an object', async () => {
        const store = await create();
        await store.writeObject('doomed', 'bye');
        await store.deleteObject('doomed');

        expect(await store.fileExists('doomed')).toBe(false);
      });
    });

    describe('copyObject()', () => {
      it('should copy content under a new name', async () => {
        const store = await create({ compression: 'zstd' });
        await store.writeObject('src', 'copied content');
        await store.copyObject('src', 'dest');

        expect(await readText(store, 'dest')).toBe('copied content');
        expect(await readText(store, 'src')).toBe('copied content');
      });
    });

    describe('walk() / walkFrom()', () => {
      it('should resume at an exact name (numbered names)', async () => {
        const store = await create({ extension: 'dbin.zst', compression: 'zstd' });
        await writeAll(store, ['00000001', '00000002', '00000003', '00000004']);

        expect(await walkNames(store, '', '00000002')).toEqual(['00000002', '00000003', '00000004']);
      });

      it('should resume at an exact name (single letters)', async () => {
        const store = await create();
        await writeAll(store, ['a', 'b', 'c', 'd']);

        expect(await walkNames(store, '', 'b')).toEqual(['b', 'c', 'd']);
      });

      it('should reject a starting point outside the prefix', async () => {
        const store = await create();
        await expect(walkNames(store, '0000', '0001/0002')).rejects.toMatchObject({
          code: 'STORE_INVALID_USAGE',
          message: 'starting point "0001/0002" must start with prefix "0000"',
        });
      });

      it('should visit names in ascending order across folders', async () => {
        const store = await create({ extension: 'jsonl.gz', compression: 'gzip' });
        await writeAll(store, ['c', 'b/2', 'a', 'b/1', 'ab']);

        expect(await walkNames(store, '')).toEqual(['a', 'ab', 'b/1', 'b/2', 'c']);
      });

      it('should restrict the walk to the prefix, even mid-segment', async () => {
        const store = await create();
        await writeAll(store, ['0000/1', '00001', '0001', 'b/1', 'b/2']);

        expect(await walkNames(store, '0000')).toEqual(['0000/1', '00001']);
        expect(await walkNames(store, 'b/')).toEqual(['b/1', 'b/2']);
        expect(await walkNames(store, 'zzz')).toEqual([]);
      });

      it('should resume between names and inside a folder', async () => {
        const store = await create();
        await writeAll(store, ['a', 'ab', 'b/1', 'b/2', 'c']);

        expect(await walkNames(store, '', 'aa')).toEqual(['ab', 'b/1', 'b/2', 'c']);
        expect(await walkNames(store, 'b/', 'b/2')).toEqual(['b/2']);
        expect(await walkNames(store, '', 'd')).toEqual([]);
      });

      it.runIf(sep === '/')('should list and read names holding a backslash', async () => {
        const store = await create({ extension: 'bin' });
        await writeAll(store, ['dir\\file', 'dir/x']);

        expect(await walkNames(store, '')).toEqual(['dir/x', 'dir\\file']);
        expect(await readText(store, 'dir\\file')).toBe('content of dir\\file');
      });

      it('should keep name order when the extension sorts after a longer name', async () => {
        const store = await create({ extension: 'ext' });
        await writeAll(store, ['a-b', 'b', 'a/c', 'a']);

        expect(await walkNames(store, '')).toEqual(['a', 'a-b', 'a/c', 'b']);
        expect(await walkNames(store, '', 'a-')).toEqual(['a-b', 'a/c', 'b']);
        expect(await store.listFiles('', 2)).toEqual(['a', 'a-b']);
      });

      it('should stop when the visitor returns STOP', async () => {
        const store = await create();
        await writeAll(store, ['a', 'b', 'c']);

        const seen: string[] = [];
        await store.walk('', (name) => {
          seen.push(name);
          return seen.length === 2 ? STOP : undefined;
        });

        expect(seen).toEqual(['a', 'b']);
      });

      it('should stop when the visitor throws StopIterationError', async () => {
        const store = await create();
        await writeAll(store, ['a', 'b', 'c']);

        const seen: string[] = [];
        await store.walk('', (name) => {
          seen.push(name);
          throw new StopIterationError();
        });

        expect(seen).toEqual(['a']);
      });

      it('should propagate other visitor errors as thrown', async () => {
        const store = await create();
        await writeAll(store, ['a']);
        const failure = new Error('visitor failed');

        await expect(
          store.walk('', () => {
            throw failure;
          })
        ).rejects.toBe(failure);
      });

      it('should reject with AbortError when the signal is already aborted', async () => {
        const store = await create();
        await writeAll(store, ['a']);
        const controller = new AbortController();
        controller.abort();

        await expect(
          store.walk('', () => undefined, { signal: controller.signal })
        ).rejects.toMatchObject({ name: 'AbortError' });
      });
    });

    describe('iterate()', () => {
      it('should yield the same names as walkFrom', async () => {
        const store = await create();
        await writeAll(store, ['a', 'b', 'c', 'd']);

        const names: string[] = [];
        for await (const name of store.iterate('', 'b')) names.push(name);

        expect(names).toEqual(['b', 'c', 'd']);
      });
    });

    describe('listFiles()', () => {
      it('should honor max', async () => {
        const store = await create();
        await writeAll(store, ['a', 'b', 'c']);

        expect(await store.listFiles('', 2)).toEqual(['a', 'b']);
        expect(await store.listFiles('', 0)).toEqual([]);
        expect(await store.listFiles('', -1)).toEqual(['a', 'b', 'c']);
      });
    });

    describe('subStore() / clone()', () => {
      it('should scope a sub-store under a folder', async () => {
        const store = await create();
        const sub = await store.subStore('nested');
        await sub.writeObject('leaf', 'inside');

        expect(await store.fileExists('nested/leaf')).toBe(true);
        expect(await sub.listFiles('', -1)).toEqual(['leaf']);
        expect(sub.objectUrl('leaf').endsWith('/nested/leaf')).toBe(true);
      });

      it('should apply setting overrides to a clone only', async () => {
        const store = await create({ overwrite: false });
        await store.writeObject('x', 'first');

        const clone = await store.clone({ overwrite: true });
        await clone.writeObject('x', 'second');

        expect(store.overwrite).toBe(false);
        expect(clone.overwrite).toBe(true);
        expect(await readText(store, 'x')).toBe('second');
      });
    });

    describe('pushLocalFile()', () => {
      it('should upload the file then delete it', async () => {
        const store = await create();
        const dir = await mkdtemp(join(tmpdir(), 'polystore-push-'));
        const localFile = join(dir, 'upload.txt');
        await writeFile(localFile, 'pushed content');

        try {
          await store.pushLocalFile(localFile, 'pushed');

          expect(existsSync(localFile)).toBe(false);
          expect(await readText(store, 'pushed')).toBe('pushed content');
        } finally {
          await rm(dir, { recursive: true, force: true });
        }
      });
    });
  });
}
