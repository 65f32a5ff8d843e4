import { posix } from 'node:path';

import type { Logger } from 'pino';

import type { Config } from '../config/index.js';
import { StoreInvalidUsageError, createSimpleStore } from '../storage/index.js';

export interface ObjectReference {
  /** Base location of the store holding the object */
  location: string;
  name: string;
}

const SCHEME = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//;

/**
 * Split an object URL into its parent location and the object name (last path
 * segment). Query parameters stay on the location.
 */
export function splitObjectUrl(raw: string): ObjectReference {
  if (!SCHEME.test(raw) || raw.startsWith('file://')) {
    const path = raw.startsWith('file://') ? decodeURIComponent(new URL(raw).pathname) : raw;
    const name = posix.basename(path);
    if (!name || path.endsWith('/')) {
      throw new StoreInvalidUsageError(`"${raw}" does not name an object`);
    }
    const directory = posix.dirname(path);
    // `/` itself would read as a location ending in a separator
    return { location: directory === '/' ? '/.' : directory, name };
  }

  const url = new URL(raw);
  const segments = url.pathname.split('/');
  const name = decodeURIComponent(segments.pop() ?? '');
  if (!name) {
    throw new StoreInvalidUsageError(`"${raw}" does not name an object`);
  }
  url.pathname = segments.join('/');
  return { location: url.toString(), name };
}

export interface CopyCommandDeps {
  config: Config;
  logger: Logger;
}

/**
 * `polystore cp <source-object-url> <destination-location>`
 *
 * Reads the object as-is and writes it under the same name in the
 * destination store, replacing any existing object.
 */
export async function copyCommand(
  source: string,
  destination: string,
  { config, logger }: CopyCommandDeps
): Promise<void> {
  const { location, name } = splitObjectUrl(source);
  const options = { ...config.store, logger };

  const from = await createSimpleStore(location, options);
  const to = await createSimpleStore(destination, options);
  try {
    logger.info({ from: from.objectUrl(name), to: to.objectUrl(name) }, 'Copying object');
    const reader = await from.openObject(name);
    try {
      await to.writeObject(name, reader);
    } finally {
      reader.destroy();
    }
    logger.info({ name }, 'Copy complete');
  } finally {
    await Promise.all([from.close(), to.close()]);
  }
}
