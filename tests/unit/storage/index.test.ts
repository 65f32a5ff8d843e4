import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect } from 'vitest';

import {
  LocalStore,
  MemoryStore,
  createDBinStore,
  createJSONLStore,
  createSimpleStore,
  createStore,
} from '@/storage/index.js';

describe('createStore()', () => {
  it('should build a local store for a path and create its directory', async () => {
    const testDir = await mkdtemp(join(tmpdir(), 'polystore-factory-test-'));
    try {
      const store = await createStore(join(testDir, 'base'));
      expect(store).toBeInstanceOf(LocalStore);
      expect(store.baseUrl.toString()).toBe(`file://${join(testDir, 'base')}`);
    } finally {
      await rm(testDir, { recursive: true, force: true });
    }
  });

  it('should build a memory store', async () => {
    expect(await createStore('memory://factory/base')).toBeInstanceOf(MemoryStore);
  });

  it('should reject a malformed location before any I/O', async () => {
    await expect(createStore('unknown://x/y')).rejects.toMatchObject({ code: 'STORE_INVALID_USAGE' });
  });

  it('should reject an unknown codec', async () => {
    await expect(createStore('memory://factory/base', { compression: 'lz4' })).rejects.toMatchObject({
      code: 'STORE_INVALID_USAGE',
      message: 'unsupported compression type "lz4", expected one of: none, gzip, zstd',
    });
  });
});

describe('preset factories', () => {
  it('should store dbin objects zstd-compressed without overwrite', async () => {
    const store = await createDBinStore('memory://factory/blocks');
    expect(store.objectPath('0001')).toBe('blocks/0001.dbin.zst');
    expect(store.overwrite).toBe(false);
  });

  it('should store jsonl objects gzip-compressed without overwrite', async () => {
    const store = await createJSONLStore('memory://factory/rows');
    expect(store.objectPath('0001')).toBe('rows/0001.jsonl.gz');
    expect(store.overwrite).toBe(false);
  });

  it('should store simple objects as-is with overwrite', async () => {
    const store = await createSimpleStore('memory://factory/files');
    expect(store.objectPath('a.txt')).toBe('files/a.txt');
    expect(store.overwrite).toBe(true);
  });
});
