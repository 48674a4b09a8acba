#!/usr/bin/env node

import { Command } from 'commander';
import { createLogger } from './utils/logger.js';
import { getVersion } from './utils/package.js';

import { setupShakeCommand } from './commands/shake.js';
import { setupUpdateCommand } from './commands/update.js';

/**
 * formula-shaker CLI - Main entry point
 *
 * Resolves salt formula dependencies and links them into a local file root.
 */

const program = new Command();

program
  .name('formula-shaker')
  .description('Resolve and install salt formula dependencies')
  .version(getVersion())
  .configureHelp({ sortSubcommands: true });

setupShakeCommand(program);
setupUpdateCommand(program);

const logger = createLogger();

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with --debug for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with --debug for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('formula-shaker')
  )) {
  run().catch((error) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

export { program };
