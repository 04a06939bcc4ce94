/**
 * Core type definitions for the geo-harvest pipeline
 */

// Geographic primitives
export interface LatLng {
  lat: number;
  lng: number;
}

export interface Bounds {
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
}

// One cell of the harvesting grid
export interface Sector {
  readonly id: string;
  readonly center: Readonly<LatLng>;
  readonly bounds: Readonly<Bounds>;
  readonly isLand: boolean;
}

export interface GridStats {
  country: string;
  gridSize: number;
  totalSectors: number;
  landSectors: number;
  waterSectors: number;
  landEliminationRatio: number;
  estimatedRequests: number;
}

// Business entity as produced by a source parser
export interface ExtractedRecord {
  readonly name: string;
  readonly address: string;
  readonly phone: string;
  readonly website: string;
  readonly category: string;
  readonly rating: number;
  readonly reviewCount: number;
  readonly location: Readonly<LatLng>;
  readonly sourceId: string;
  readonly sourceTag: string;
  readonly hours: unknown;
}

// Merged entity, one per dedup key
export interface CanonicalRecord extends ExtractedRecord {
  readonly sources: readonly string[];
}

// Explicit extraction outcomes
export type ExtractionOutcome =
  | { kind: 'records'; records: ExtractedRecord[] }
  | { kind: 'no-data' }
  | { kind: 'unrecognized'; reason: string };

// Proxy endpoint state, owned by the rotator
export interface ProxyEndpoint {
  readonly id: string;
  readonly url: string;
  failed: boolean;
}

export type AttemptOutcome = 'success' | 'retryable' | 'rate-limited' | 'fatal';

export interface FetchAttempt {
  url: string;
  proxy?: string;
  attempt: number;
  outcome: AttemptOutcome;
  statusCode?: number;
}

export type SectorStatus = 'ok' | 'no-data' | 'unrecognized' | 'exhausted';

export interface SectorResult {
  sectorId: string;
  sourceTag: string;
  status: SectorStatus;
  records: ExtractedRecord[];
  attempts: FetchAttempt[];
}

// HTTP transport types
export interface HttpRequest {
  method: 'GET' | 'POST';
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface HttpResponse {
  status: number;
  body: string;
}

export interface SendOptions {
  proxyUrl?: string;
  timeoutMs: number;
}

export interface HttpTransport {
  send(request: HttpRequest, options: SendOptions): Promise<HttpResponse>;
  close(): Promise<void>;
}

// Run profile controlling concurrency and pacing
export type ProfileName = 'fast' | 'medium' | 'slow';

export interface RunProfile {
  name: ProfileName;
  maxConcurrent: number;
  delayRangeMs: readonly [number, number];
  poolSize: number;
  perHostConnections: number;
  batchSize: number;
  gcEvery: number;
  description: string;
}

// Row persisted by the storage sink
export interface StoredBusiness {
  place_id: string;
  country: string;
  name: string;
  phone: string;
  address: string;
  website: string;
  rating: number;
  reviews_count: number;
  category: string;
  hours: string;
  latitude: number;
  longitude: number;
  sources: string;
  scraped_at: string;
}

export interface StorageStats {
  total_businesses: number;
  top_categories: Array<{ category: string; count: number }>;
  rating_distribution: Array<{ rating_range: string; count: number }>;
  total_reviews: number;
  avg_reviews_per_business: number;
}

// Storage interface
export interface BusinessStorage {
  runMigrations(): Promise<void>;
  /** Distinct rows written; a repeated place_id within the batch keeps its last row */
  upsertMany(records: readonly CanonicalRecord[], scrapedAt: string, country: string): Promise<number>;
  count(): Promise<number>;
  /** Rows of one country when given, every row otherwise */
  all(country?: string): Promise<StoredBusiness[]>;
  getStats(): Promise<StorageStats>;
  testConnection(): Promise<boolean>;
  close(): Promise<void>;
}

// CLI argument types
export type ModeOption = 'auto' | ProfileName;

export interface HarvestArgs {
  country: string;
  query: string;
  sources: string[];
  proxyFile?: string;
  mode: ModeOption;
  gridSize: number;
  maxSectors?: number;
}

export interface ExportArgs {
  country: string;
  format: 'csv' | 'json' | 'both';
  out: string;
}

// Utility types
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

// Error types
export class FetchError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public rateLimited: boolean = false
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class StorageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StorageError';
  }
}
