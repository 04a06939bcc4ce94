/**
 * Storage factory
 */

import { resolve } from 'path';
import { StorageError, type BusinessStorage } from '../types.js';
import { logger } from '../util/logger.js';

export const DEFAULT_DATABASE_URL = 'sqlite://./data/businesses.db';

/**
 * Create storage instance based on DATABASE_URL
 */
export async function createStorage(databaseUrl: string = process.env.DATABASE_URL || DEFAULT_DATABASE_URL): Promise<BusinessStorage> {
  logger.info('Creating storage instance', { databaseUrl: sanitizeUrl(databaseUrl) });

  if (databaseUrl.startsWith('sqlite://')) {
    const { SqliteStorage } = await import('./sqlite.js');
    const dbPath = databaseUrl.replace('sqlite://', '');
    return new SqliteStorage(dbPath === ':memory:' ? dbPath : resolve(process.cwd(), dbPath));
  }

  if (databaseUrl.startsWith('postgres://') || databaseUrl.startsWith('postgresql://')) {
    const { PostgresStorage } = await import('./postgres.js');
    return new PostgresStorage(databaseUrl);
  }

  throw new StorageError(`Unsupported database URL format: ${databaseUrl}`);
}

/**
 * Sanitize database URL for logging (remove credentials)
 */
export function sanitizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.username || parsed.password) {
      return `${parsed.protocol}//${parsed.hostname}:${parsed.port}${parsed.pathname}`;
    }
    return url;
  } catch {
    const parts = url.split('://');
    if (parts.length > 1) {
      return `${parts[0]}://***`;
    }
    return url;
  }
}

export type { BusinessStorage } from '../types.js';
