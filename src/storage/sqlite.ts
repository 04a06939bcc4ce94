/**
 * SQLite storage implementation using better-sqlite3
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { logger } from '../util/logger.js';
import { StorageError } from '../types.js';
import type { BusinessStorage, CanonicalRecord, StorageStats, StoredBusiness } from '../types.js';
import {
  BUSINESS_COLUMNS,
  CountSchema,
  RATING_DISTRIBUTION_SQL,
  REVIEW_TOTALS_SQL,
  StoredBusinessSchema,
  TOP_CATEGORIES_SQL,
  buildStats,
  loadMigrationStatements,
  toUniqueRows,
} from './rows.js';

export class SqliteStorage implements BusinessStorage {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);

    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('temp_store = memory');

    logger.info('SQLite database initialized', { path: dbPath });
  }

  async runMigrations(): Promise<void> {
    try {
      const { files, statements } = loadMigrationStatements('sqlite');
      this.db.transaction(() => {
        for (const statement of statements) {
          this.db.exec(statement);
        }
      })();
      logger.info('SQLite migrations completed', { files });
    } catch (error) {
      throw new StorageError(`Migration failed: ${error}`);
    }
  }

  async testConnection(): Promise<boolean> {
    try {
      this.db.prepare('SELECT 1').get();
      return true;
    } catch (error) {
      logger.error('SQLite connection test failed', { error });
      return false;
    }
  }

  /**
   * Insert or replace on (country, place_id), in one transaction
   */
  async upsertMany(records: readonly CanonicalRecord[], scrapedAt: string, country: string): Promise<number> {
    if (records.length === 0) {
      return 0;
    }

    try {
      const stmt = this.db.prepare(`
        INSERT OR REPLACE INTO businesses (${BUSINESS_COLUMNS.join(', ')})
        VALUES (${BUSINESS_COLUMNS.map(c => `@${c}`).join(', ')})
      `);

      const insertAll = this.db.transaction((rows: StoredBusiness[]) => {
        for (const row of rows) {
          stmt.run(row);
        }
        return rows.length;
      });

      return insertAll(toUniqueRows(records, scrapedAt, country));
    } catch (error) {
      throw new StorageError(`Failed to upsert businesses: ${error}`);
    }
  }

  async count(): Promise<number> {
    try {
      return CountSchema.parse(this.db.prepare('SELECT COUNT(*) AS count FROM businesses').get()).count;
    } catch (error) {
      throw new StorageError(`Failed to count businesses: ${error}`);
    }
  }

  async all(country?: string): Promise<StoredBusiness[]> {
    try {
      const columns = BUSINESS_COLUMNS.join(', ');
      const rows = country === undefined
        ? this.db.prepare(`SELECT ${columns} FROM businesses ORDER BY id ASC`).all()
        : this.db.prepare(`SELECT ${columns} FROM businesses WHERE country = ? ORDER BY id ASC`).all(country.toLowerCase());
      return z.array(StoredBusinessSchema).parse(rows);
    } catch (error) {
      throw new StorageError(`Failed to read businesses: ${error}`);
    }
  }

  async getStats(): Promise<StorageStats> {
    try {
      return buildStats(
        await this.count(),
        this.db.prepare(TOP_CATEGORIES_SQL).all(),
        this.db.prepare(RATING_DISTRIBUTION_SQL).all(),
        this.db.prepare(REVIEW_TOTALS_SQL).get()
      );
    } catch (error) {
      throw new StorageError(`Failed to compute statistics: ${error}`);
    }
  }

  async close(): Promise<void> {
    try {
      this.db.close();
      logger.info('SQLite database connection closed');
    } catch (error) {
      throw new StorageError(`Failed to close database: ${error}`);
    }
  }
}
