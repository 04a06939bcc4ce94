/**
 * PostgreSQL storage implementation
 */

import { Pool } from 'pg';
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

const UPSERT_BATCH_SIZE = 100;

export class PostgresStorage implements BusinessStorage {
  private pool: Pool;

  constructor(connectionString: string) {
    this.pool = new Pool({ connectionString });
  }

  async runMigrations(): Promise<void> {
    const client = await this.pool.connect();
    try {
      const { files, statements } = loadMigrationStatements('postgres');
      await client.query('BEGIN');
      for (const statement of statements) {
        await client.query(statement);
      }
      await client.query('COMMIT');
      logger.info('PostgreSQL migrations completed', { files });
    } catch (error) {
      await client.query('ROLLBACK');
      throw new StorageError(`Migration failed: ${error}`);
    } finally {
      client.release();
    }
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (error) {
      logger.error('PostgreSQL connection test failed', { error });
      return false;
    }
  }

  /**
   * Multi-row INSERT ... ON CONFLICT (country, place_id) DO UPDATE, in batches.
   * A statement may touch each key once, so rows are collapsed per place_id first.
   */
  async upsertMany(records: readonly CanonicalRecord[], scrapedAt: string, country: string): Promise<number> {
    const rows = toUniqueRows(records, scrapedAt, country);
    if (rows.length === 0) {
      return 0;
    }
    const updates = BUSINESS_COLUMNS
      .filter(c => c !== 'place_id' && c !== 'country')
      .map(c => `${c} = EXCLUDED.${c}`)
      .join(', ');

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      for (let i = 0; i < rows.length; i += UPSERT_BATCH_SIZE) {
        const batch = rows.slice(i, i + UPSERT_BATCH_SIZE);
        const params: Array<string | number> = [];
        const tuples = batch.map(row => {
          const placeholders = BUSINESS_COLUMNS.map(column => {
            params.push(row[column]);
            return `$${params.length}`;
          });
          return `(${placeholders.join(', ')})`;
        });

        await client.query(
          `INSERT INTO businesses (${BUSINESS_COLUMNS.join(', ')})
           VALUES ${tuples.join(', ')}
           ON CONFLICT (country, place_id) DO UPDATE SET ${updates}`,
          params
        );
      }
      await client.query('COMMIT');
      return rows.length;
    } catch (error) {
      await client.query('ROLLBACK');
      throw new StorageError(`Failed to upsert businesses: ${error}`);
    } finally {
      client.release();
    }
  }

  async count(): Promise<number> {
    const res = await this.pool.query('SELECT COUNT(*) AS count FROM businesses');
    return CountSchema.parse(res.rows[0]).count;
  }

  async all(country?: string): Promise<StoredBusiness[]> {
    const columns = BUSINESS_COLUMNS.join(', ');
    const res = country === undefined
      ? await this.pool.query(`SELECT ${columns} FROM businesses ORDER BY id ASC`)
      : await this.pool.query(`SELECT ${columns} FROM businesses WHERE country = $1 ORDER BY id ASC`, [country.toLowerCase()]);
    return z.array(StoredBusinessSchema).parse(res.rows);
  }

  async getStats(): Promise<StorageStats> {
    const [categories, ratings, reviews] = await Promise.all([
      this.pool.query(TOP_CATEGORIES_SQL),
      this.pool.query(RATING_DISTRIBUTION_SQL),
      this.pool.query(REVIEW_TOTALS_SQL),
    ]);
    return buildStats(await this.count(), categories.rows, ratings.rows, reviews.rows[0]);
  }

  async close(): Promise<void> {
    await this.pool.end();
    logger.info('PostgreSQL pool closed');
  }
}
