#!/usr/bin/env node

/**
 * Main entry point for the chartfeed binary
 */

// Load environment variables from .env file
import 'dotenv/config';

import { attachGlobalHandlers, createLogger } from '@chartfeed/logger';
import { createProgram } from './cli.js';
import { formatCommandError } from './commands/errors.js';
import { loadConfig } from './config/index.js';
import { buildDatafeed } from './services/datafeed.factory.js';

async function start(): Promise<void> {
  const config = loadConfig();

  // stdout carries the data; logs go to stderr
  const logger = createLogger({
    level: config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
  });
  attachGlobalHandlers(logger);
  logger.debug('Starting', { argv: process.argv.slice(2) });

  const program = createProgram({
    datafeed: () => buildDatafeed(config, logger),
    logger,
    defaultSleepSeconds: config.download.sleepSeconds,
  });
  await program.parseAsync(process.argv);
}

start().catch((error: unknown) => {
  process.stderr.write(`${formatCommandError(error)}\n`);
  process.exitCode = 1;
});
