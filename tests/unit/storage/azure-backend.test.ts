import { describe, it, expect, vi, beforeEach } from 'vitest';

import { createStore } from '@/storage/index.js';
import type { StoreOptions } from '@/storage/index.js';

import { azureContainers, azureCredentials, resetFakeAzure } from '../../support/fake-azure.js';
import { readText, storeContract, walkNames } from '../../support/store-contract.js';

vi.mock('@azure/storage-blob', async () => {
  const fake = await import('../../support/fake-azure.js');
  return {
    BlobServiceClient: fake.BlobServiceClient,
    StorageSharedKeyCredential: fake.StorageSharedKeyCredential,
  };
});

const BASE = 'az://account.container/base';

function create(options: StoreOptions = {}): ReturnType<typeof createStore> {
  return createStore(BASE, { ...options, azure: { accountKey: 'test-secret' } });
}

describe('AzureStore', () => {
  beforeEach(() => {
    resetFakeAzure();
  });

  storeContract(create);

  it('should authenticate with the configured account key', async () => {
    await create();
    expect(azureCredentials).toEqual([['account', 'test-secret']]);
  });

  it('should fall back to AZURE_STORAGE_KEY', async () => {
    process.env.AZURE_STORAGE_KEY = 'test-env-secret';
    await createStore(BASE);

    expect(azureCredentials).toEqual([['account', 'test-env-secret']]);
  });

  it('should reject a location without any account key', async () => {
    await expect(createStore(BASE)).rejects.toMatchObject({
      code: 'STORE_INVALID_USAGE',
      message:
        'specify azure access storage key with the azure.accountKey option or env var: AZURE_STORAGE_KEY',
    });
  });

  it('should store blobs under the path of the location', async () => {
    const store = await create({ extension: 'jsonl.gz', compression: 'gzip' });
    await store.writeObject('2024/a', '{}');

    expect([...(azureContainers.get('account/container')?.keys() ?? [])]).toEqual(['base/2024/a.jsonl.gz']);
    expect(store.objectUrl('2024/a')).toBe('az://account.container/base/2024/a.jsonl.gz');
  });

  it('should treat an existing blob as a successful no-op without overwrite', async () => {
    const store = await create({ overwrite: false });
    await store.writeObject('x', 'first');

    await expect(store.writeObject('x', 'second')).resolves.toBeUndefined();
    expect(await readText(store, 'x')).toBe('first');
  });

  it('should resume walks client-side across pages', async () => {
    const store = await create();
    for (const name of ['a', 'b', 'c', 'd', 'e']) await store.writeObject(name, name);

    expect(await walkNames(store, '', 'c')).toEqual(['c', 'd', 'e']);
  });

  it('should reject deleteObject with NotFound for a missing blob', async () => {
    const store = await create();
    await expect(store.deleteObject('absent')).rejects.toMatchObject({ code: 'STORE_NOT_FOUND' });
  });
});
