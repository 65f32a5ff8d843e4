import { z } from 'zod';

import { StoreOptionsSchema } from '../storage/config.js';

export { StoreOptionsSchema } from '../storage/config.js';

export const ConfigSchema = z.object({
  logging: z
    .object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
      pretty: z.boolean().default(false),
    })
    .default(() => ({ level: 'info' as const, pretty: false })),

  // Backend tuning applied to every store the CLI opens
  store: StoreOptionsSchema.pick({ s3: true, azure: true }).default(() => ({
    s3: { readAttempts: 1, bufferedRead: false },
    azure: {},
  })),
});

export type Config = z.infer<typeof ConfigSchema>;
