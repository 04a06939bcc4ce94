/**
 * Mapping between canonical records and persisted rows
 */

import { readFileSync, readdirSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import type { CanonicalRecord, StorageStats, StoredBusiness } from '../types.js';

export const BUSINESS_COLUMNS = [
  'place_id',
  'country',
  'name',
  'phone',
  'address',
  'website',
  'rating',
  'reviews_count',
  'category',
  'hours',
  'latitude',
  'longitude',
  'sources',
  'scraped_at',
] as const satisfies ReadonlyArray<keyof StoredBusiness>;

export const StoredBusinessSchema = z.object({
  place_id: z.string(),
  country: z.string(),
  name: z.string(),
  phone: z.string(),
  address: z.string(),
  website: z.string(),
  rating: z.coerce.number(),
  reviews_count: z.coerce.number().int(),
  category: z.string(),
  hours: z.string(),
  latitude: z.coerce.number(),
  longitude: z.coerce.number(),
  sources: z.string(),
  scraped_at: z.string(),
});

export const CategoryCountSchema = z.object({ category: z.string(), count: z.coerce.number() });
export const RatingBucketSchema = z.object({ rating_range: z.string(), count: z.coerce.number() });
export const ReviewTotalsSchema = z.object({
  total_reviews: z.coerce.number().nullable(),
  avg_reviews: z.coerce.number().nullable(),
});
export const CountSchema = z.object({ count: z.coerce.number() });

export const TOP_CATEGORIES_SQL = `
  SELECT category, COUNT(*) AS count
  FROM businesses
  WHERE category != ''
  GROUP BY category
  ORDER BY count DESC, category ASC
  LIMIT 10
`;

export const RATING_DISTRIBUTION_SQL = `
  SELECT
    CASE
      WHEN rating >= 4.5 THEN '4.5-5.0'
      WHEN rating >= 4.0 THEN '4.0-4.4'
      WHEN rating >= 3.0 THEN '3.0-3.9'
      ELSE '<3.0'
    END AS rating_range,
    COUNT(*) AS count
  FROM businesses
  WHERE rating > 0
  GROUP BY rating_range
  ORDER BY rating_range DESC
`;

export const REVIEW_TOTALS_SQL = `
  SELECT SUM(reviews_count) AS total_reviews, AVG(reviews_count) AS avg_reviews
  FROM businesses
`;

export function toStoredBusiness(record: CanonicalRecord, scrapedAt: string, country: string): StoredBusiness {
  return {
    place_id: record.sourceId,
    country: country.toLowerCase(),
    name: record.name,
    phone: record.phone,
    address: record.address,
    website: record.website,
    rating: record.rating,
    reviews_count: record.reviewCount,
    category: record.category,
    hours: JSON.stringify(record.hours ?? {}),
    latitude: record.location.lat,
    longitude: record.location.lng,
    sources: record.sources.join(','),
    scraped_at: scrapedAt,
  };
}

/**
 * Rows for one upsert, one per place_id. Records with a fallback id can share
 * it; the later row wins, keeping the position of the first.
 */
export function toUniqueRows(
  records: readonly CanonicalRecord[],
  scrapedAt: string,
  country: string
): StoredBusiness[] {
  const byPlaceId = new Map<string, StoredBusiness>();
  for (const record of records) {
    const row = toStoredBusiness(record, scrapedAt, country);
    byPlaceId.set(row.place_id, row);
  }
  return [...byPlaceId.values()];
}

export function buildStats(
  total: number,
  categories: unknown[],
  ratings: unknown[],
  reviews: unknown
): StorageStats {
  const totals = ReviewTotalsSchema.parse(reviews);
  return {
    total_businesses: total,
    top_categories: z.array(CategoryCountSchema).parse(categories),
    rating_distribution: z.array(RatingBucketSchema).parse(ratings),
    total_reviews: totals.total_reviews ?? 0,
    avg_reviews_per_business: totals.avg_reviews !== null ? Math.round(totals.avg_reviews * 100) / 100 : 0,
  };
}

/**
 * SQL statements from every .sql file of a backend, in file name order
 */
export function loadMigrationStatements(backend: 'sqlite' | 'postgres'): { files: string[]; statements: string[] } {
  const migrationsDir = resolve(process.cwd(), 'src/storage/migrations', backend);
  const files = readdirSync(migrationsDir).filter(f => f.endsWith('.sql')).sort();
  const statements = files.flatMap(file =>
    readFileSync(resolve(migrationsDir, file), 'utf-8')
      .split(';')
      .map(stmt => stmt.trim())
      .filter(stmt => stmt.length > 0)
  );
  return { files, statements };
}
