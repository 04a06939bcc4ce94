#!/usr/bin/env node

/**
 * Database migration runner
 */

import { config } from 'dotenv';
import { parseArgs } from 'util';
import { createStorage, sanitizeUrl, DEFAULT_DATABASE_URL } from '../index.js';
import { logger, describeError } from '../../util/logger.js';
import { isEntryPoint, printHelp } from '../../util/cli.js';
import { StorageError } from '../../types.js';

config();

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: { help: { type: 'boolean', short: 'h' } },
  });
  if (values.help) {
    printHelp('\nUsage: npm run migrate\n\nApplies src/storage/migrations/<backend>/*.sql to $DATABASE_URL\n');
  }

  logger.info('Starting database migration', {
    databaseUrl: sanitizeUrl(process.env.DATABASE_URL || DEFAULT_DATABASE_URL),
  });

  const storage = await createStorage();
  try {
    const isConnected = await storage.testConnection();
    if (!isConnected) {
      throw new StorageError('Database connection failed');
    }

    await storage.runMigrations();
    logger.info('Database migration completed successfully');
  } finally {
    await storage.close();
  }
}

if (isEntryPoint(import.meta.url)) {
  main()
    .then(() => process.exit(0))
    .catch((error) => {
      logger.error('Database migration failed', { error: describeError(error) });
      process.exit(1);
    });
}
