#!/usr/bin/env node

/**
 * Main entry point for the geo-harvest CLI
 */

import { config } from 'dotenv';
import { logger, describeError } from './util/logger.js';
import { isEntryPoint } from './util/cli.js';

// Load environment variables
config();

const COMMANDS = {
  harvest: () => import('./harvest/run.js'),
  export: () => import('./export/run.js'),
  grid: () => import('./grid/run.js'),
  migrate: () => import('./storage/migrations/run.js'),
} as const;

type CommandName = keyof typeof COMMANDS;

function isCommand(value: string | undefined): value is CommandName {
  return value !== undefined && Object.hasOwn(COMMANDS, value);
}

const USAGE = `
Usage: geo-harvest <command> [options]

Commands:
  harvest   Fetch businesses over a country grid and store them
  export    Write stored businesses to CSV/JSON
  grid      Print land grid statistics for a country
  migrate   Apply database migrations

Run geo-harvest <command> --help for command options.
`;

async function main() {
  const [command, ...rest] = process.argv.slice(2);

  if (!isCommand(command)) {
    console.log(USAGE);
    process.exit(command === undefined || command === '--help' || command === '-h' ? 0 : 1);
  }

  const loaded = await COMMANDS[command]();
  await loaded.main(rest);
  process.exit(0);
}

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', { reason: describeError(reason) });
  process.exit(1);
});

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

if (isEntryPoint(import.meta.url)) {
  main().catch((error) => {
    logger.error('Main process error', { error: describeError(error) });
    process.exit(1);
  });
}
