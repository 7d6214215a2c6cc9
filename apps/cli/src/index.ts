#!/usr/bin/env node
import { createLoggerRegistryFromEnv } from '@pacer/logger';
import { Command } from 'commander';

import { registerSmashCommand } from './features/smash/smash.js';

const logging = createLoggerRegistryFromEnv();
const logger = logging.getLogger('CLI');
const program = new Command();

async function main() {
  program.name('pacer').description('Time-throttled progress logging for long-running jobs').version('0.1.0');

  // Smash command - synthetic workload through each kind of progress logger
  registerSmashCommand(program, logging);

  await program.parseAsync();
}

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  logging.flush();
  process.exit(1);
});

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error(`Uncaught Exception: ${error.message}`);
  logger.error(`Stack: ${error.stack}`);
  logging.flush();
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error(`CLI failed: ${String(error)}`);
  logging.flush();
  process.exit(1);
});
