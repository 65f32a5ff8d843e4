import pino from 'pino';
import type { Logger } from 'pino';
import { z } from 'zod';

import { parseCompression } from './compression.js';
import { StoreInvalidUsageError } from './errors.js';
import type { MeteringHooks, StoreSettings } from './types.js';

/**
 * Store options Zod schema.
 *
 * Everything tunable about a store is an explicit field here; nothing is read
 * from process-wide state, so differently configured stores can live side by
 * side (and in parallel tests).
 *
 * SECURITY: `azure.accountKey` is sensitive. It must never appear in logs.
 */
export const StoreOptionsSchema = z.object({
  /** Suffix appended as `.<extension>` to object names (e.g. `jsonl.gz`) */
  extension: z
    .string()
    .default('')
    .refine((ext) => !ext.startsWith('.'), 'extension must not start with "."'),
  /** Codec name: none, gzip (gz) or zstd */
  compression: z.string().default('none'),
  /** Replace existing objects on write (false makes a second write a no-op) */
  overwrite: z.boolean().default(false),
  /** Wait before verifying a pushed file exists (0 disables the verification) */
  pushVerifyDelayMs: z.number().int().min(0).max(60_000).default(0),

  s3: z
    .object({
      /** Attempts at opening an object before giving up */
      readAttempts: z.number().int().min(1).max(20).default(1),
      /** Download whole objects before decoding instead of streaming them */
      bufferedRead: z.boolean().default(false),
    })
    .default(() => ({ readAttempts: 1, bufferedRead: false })),

  azure: z
    .object({
      /** Storage account key (sensitive - never log). Falls back to AZURE_STORAGE_KEY. */
      accountKey: z.string().min(1).optional(),
    })
    .default(() => ({})),
});

export type StoreOptionsInput = z.input<typeof StoreOptionsSchema>;
export type ParsedStoreOptions = z.infer<typeof StoreOptionsSchema>;

/** Options accepted by the store factories. */
export type StoreOptions = StoreOptionsInput & {
  hooks?: MeteringHooks;
  logger?: Logger;
};

export interface ResolvedStoreOptions {
  settings: StoreSettings;
  s3: ParsedStoreOptions['s3'];
  azure: ParsedStoreOptions['azure'];
}

const silentLogger = pino({ level: 'silent' });

/**
 * Validate store options and turn them into immutable settings.
 * Throws StoreInvalidUsageError when the options do not validate.
 */
export function resolveStoreOptions(options: StoreOptions = {}): ResolvedStoreOptions {
  const { hooks, logger, ...rest } = options;
  const result = StoreOptionsSchema.safeParse(rest);

  if (!result.success) {
    const errors = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new StoreInvalidUsageError(`invalid store options: ${errors}`);
  }

  const parsed = result.data;
  return {
    settings: Object.freeze({
      extension: parsed.extension,
      compression: parseCompression(parsed.compression),
      overwrite: parsed.overwrite,
      pushVerifyDelayMs: parsed.pushVerifyDelayMs,
      hooks: Object.freeze({ ...hooks }),
      logger: logger ?? silentLogger,
    }),
    s3: parsed.s3,
    azure: parsed.azure,
  };
}
