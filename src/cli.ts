#!/usr/bin/env node

import { Command } from 'commander';

import { copyCommand } from './commands/cp.js';
import { defaultConfig, loadConfig } from './config/index.js';
import { createLogger } from './logger.js';

const program = new Command();

program
  .name('polystore')
  .description('Copy objects between local, S3, Google Cloud Storage and Azure stores')
  .version('0.1.0');

program
  .command('cp <source-object-url> <destination-location>')
  .description('Copy one object into a destination store, keeping its name')
  .option('-c, --config <file>', 'JSON configuration file (logging, backend options)')
  .action(async (source: string, destination: string, options: { config?: string }) => {
    const config = options.config ? loadConfig(options.config) : defaultConfig();
    const logger = createLogger(config.logging);
    await copyCommand(source, destination, { config, logger });
  });

program.parseAsync().catch((err: unknown) => {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
