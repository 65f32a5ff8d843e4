// Store walkthrough -- Example
//
// Demonstrates the store lifecycle against any supported location:
//   1. Open a zstd-compressed store with metering hooks
//   2. Write a handful of numbered objects
//   3. Write one again without overwrite (no-op)
//   4. Walk the names, then resume from a starting point
//   5. Read an object back and check its attributes
//   6. Copy, delete and list
//
// Usage:
//   STORE_LOCATION=./example-store tsx examples/client.ts
//   STORE_LOCATION='s3://bucket/path?region=us-east-1' tsx examples/client.ts
//
// Environment variables:
//   STORE_LOCATION     (optional) -- Base location (default: ./example-store)
//   AZURE_STORAGE_KEY  (az:// only) -- Storage account key

import { text } from 'node:stream/consumers';

import { STOP, createDBinStore, createLogger, isNotFoundError } from '../src/index.js';

const STORE_LOCATION = process.env.STORE_LOCATION ?? './example-store';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function log(step: string, message: string): void {
  console.log(`\n[${'='.repeat(60)}]`);
  console.log(`[STEP] ${step}`);
  console.log(`       ${message}`);
  console.log(`[${'='.repeat(60)}]`);
}

function logDetail(label: string, value: string): void {
  console.log(`  ${label}: ${value}`);
}

// ---------------------------------------------------------------------------
// Main flow
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  console.log('\n  Store walkthrough -- Example');
  console.log('  ============================\n');
  console.log(`  Location: ${STORE_LOCATION}`);

  // ---- Step 1: Open the store ----
  log('1/6', 'Opening a dbin.zst store with metering hooks');

  const meter = { compressedWrite: 0, uncompressedWrite: 0 };
  const store = await createDBinStore(STORE_LOCATION, {
    logger: createLogger({ level: 'warn', pretty: false }),
    hooks: {
      compressedWrite: (n) => (meter.compressedWrite += n),
      uncompressedWrite: (n) => (meter.uncompressedWrite += n),
    },
  });

  logDetail('Base URL', store.baseUrl.toString());
  logDetail('Overwrite', String(store.overwrite));

  try {
    // ---- Step 2: Write objects ----
    log('2/6', 'Writing numbered objects');

    for (let n = 1; n <= 5; n++) {
      const name = `blocks/${String(n).padStart(10, '0')}`;
      await store.writeObject(name, `block ${n}\n`.repeat(100));
      logDetail('Wrote', store.objectUrl(name));
    }
    logDetail('Bytes in', String(meter.uncompressedWrite));
    logDetail('Bytes stored', String(meter.compressedWrite));

    // ---- Step 3: Write again without overwrite ----
    log('3/6', 'Writing an existing name again (kept as is)');

    await store.writeObject('blocks/0000000001', 'replacement');
    const first = await text(await store.openObject('blocks/0000000001'));
    logDetail('Still original', String(first.startsWith('block 1')));

    // ---- Step 4: Walk ----
    log('4/6', 'Walking names, then resuming from 0000000003');

    await store.walk('blocks/', (name) => {
      logDetail('Walked', name);
    });
    await store.walkFrom('blocks/', 'blocks/0000000003', (name) => {
      logDetail('Resumed', name);
      return name === 'blocks/0000000004' ? STOP : undefined;
    });

    // ---- Step 5: Read back ----
    log('5/6', 'Reading an object and its attributes');

    const content = await text(await store.openObject('blocks/0000000002'));
    const attributes = await store.objectAttributes('blocks/0000000002');
    logDetail('Lines', String(content.split('\n').length - 1));
    logDetail('Stored size', `${attributes.size} bytes`);
    logDetail('Last modified', attributes.lastModified.toISOString());

    // ---- Step 6: Copy, delete, list ----
    log('6/6', 'Copying, deleting and listing');

    await store.copyObject('blocks/0000000005', 'archive/0000000005');
    await store.deleteObject('blocks/0000000005');
    try {
      await store.openObject('blocks/0000000005');
    } catch (error) {
      logDetail('Deleted object', isNotFoundError(error) ? 'not found, as expected' : String(error));
    }
    logDetail('Listed', (await store.listFiles('', -1)).join(', '));
  } finally {
    await store.close();
  }

  console.log('\n  Walkthrough complete\n');
}

main().catch((error: unknown) => {
  console.error('\nFATAL:', error instanceof Error ? error.message : error);
  process.exit(1);
});
