/**
 * Sector fetch engine: bounded concurrency, jitter, proxy rotation and retry
 */

import pLimit, { type LimitFunction } from 'p-limit';
import {
  FetchError,
  type ExtractionOutcome,
  type FetchAttempt,
  type HttpTransport,
  type RunProfile,
  type Sector,
  type SectorResult,
} from '../types.js';
import type { MapSource } from '../sources/types.js';
import { BackoffError, sleep, uniformBetween, withBackoff, type SleepFn } from '../util/backoff.js';
import { logger, describeError } from '../util/logger.js';
import { RunCounters } from './counters.js';
import { ProxyRotator } from './proxies.js';

export const REQUEST_TIMEOUT_MS = 30000;
export const MAX_ATTEMPTS = 3;

export interface FetchEngineOptions {
  profile: RunProfile;
  transport: HttpTransport;
  rotator?: ProxyRotator;
  counters?: RunCounters;
  timeoutMs?: number;
  maxAttempts?: number;
  backoffBaseMs?: number;
  sleep?: SleepFn;
  random?: () => number;
}

export class FetchEngine {
  readonly counters: RunCounters;
  readonly rotator: ProxyRotator;
  private readonly profile: RunProfile;
  private readonly transport: HttpTransport;
  private readonly limit: LimitFunction;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly backoffBaseMs: number;
  private readonly sleep: SleepFn;
  private readonly random: () => number;

  constructor(options: FetchEngineOptions) {
    this.profile = options.profile;
    this.transport = options.transport;
    this.rotator = options.rotator ?? new ProxyRotator();
    this.counters = options.counters ?? new RunCounters();
    this.limit = pLimit(options.profile.maxConcurrent);
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.maxAttempts = options.maxAttempts ?? MAX_ATTEMPTS;
    this.backoffBaseMs = options.backoffBaseMs ?? 1000;
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
  }

  /**
   * One logical fetch for a sector. Never rejects for network or payload
   * problems: those end up in the result status and the counters.
   */
  fetchSector(source: MapSource, sector: Sector, query: string): Promise<SectorResult> {
    return this.limit(() => this.runSector(source, sector, query));
  }

  /**
   * Issue every sector of a batch concurrently and wait for all of them
   */
  fetchBatch(source: MapSource, sectors: readonly Sector[], query: string): Promise<SectorResult[]> {
    return Promise.all(sectors.map(sector => this.fetchSector(source, sector, query)));
  }

  get activeCount(): number {
    return this.limit.activeCount;
  }

  private async runSector(source: MapSource, sector: Sector, query: string): Promise<SectorResult> {
    const [minDelay, maxDelay] = this.profile.delayRangeMs;
    await this.sleep(uniformBetween(minDelay, maxDelay, this.random));

    const attempts: FetchAttempt[] = [];

    try {
      const outcome = await withBackoff(
        attempt => this.attemptOnce(source, sector, query, attempt, attempts),
        {
          maxAttempts: this.maxAttempts,
          baseDelayMs: this.backoffBaseMs,
          sleep: this.sleep,
          isRetryable: error => error instanceof FetchError,
          onRetry: () => this.counters.increment('retries'),
        }
      );
      return this.toResult(source, sector, outcome, attempts);

    } catch (error) {
      if (!(error instanceof BackoffError)) {
        throw error;
      }
      this.counters.increment('sectorsExhausted');
      logger.debug('Sector dropped after failed attempts', {
        sector: sector.id,
        source: source.tag,
        attempts: error.attempts,
        error: describeError(error.lastError),
      });
      return { sectorId: sector.id, sourceTag: source.tag, status: 'exhausted', records: [], attempts };
    }
  }

  private async attemptOnce(
    source: MapSource,
    sector: Sector,
    query: string,
    attempt: number,
    attempts: FetchAttempt[]
  ): Promise<ExtractionOutcome> {
    const proxy = this.rotator.next();
    let url = '';

    try {
      const request = source.buildRequest(sector, query, this.random);
      url = request.url;

      this.counters.increment('requests');
      const response = await this.transport
        .send(request, { proxyUrl: proxy?.url, timeoutMs: this.timeoutMs })
        .catch((error: unknown) => {
          this.counters.increment('networkFailures');
          throw error instanceof FetchError ? error : new FetchError(describeError(error));
        });

      if (response.status === 200) {
        this.counters.increment('successes');
        attempts.push({ url, proxy: proxy?.id, attempt, outcome: 'success', statusCode: 200 });
        return this.extract(source, response.body, sector);
      }

      if (response.status === 429) {
        this.counters.increment('rateLimited');
        if (proxy) {
          this.rotator.markFailed(proxy.id);
        }
        attempts.push({ url, proxy: proxy?.id, attempt, outcome: 'rate-limited', statusCode: 429 });
        throw new FetchError('Rate limited', 429, true);
      }

      attempts.push({ url, proxy: proxy?.id, attempt, outcome: 'retryable', statusCode: response.status });
      throw new FetchError(`HTTP ${response.status}`, response.status);

    } catch (error) {
      const recorded = attempts.some(a => a.attempt === attempt);
      if (!recorded) {
        attempts.push({
          url,
          proxy: proxy?.id,
          attempt,
          outcome: error instanceof FetchError ? 'retryable' : 'fatal',
        });
      }
      throw error;
    }
  }

  /**
   * Parse errors stay here: they count and yield an unrecognized outcome
   */
  private extract(source: MapSource, body: string, sector: Sector): ExtractionOutcome {
    try {
      return source.parse(body, sector);
    } catch (error) {
      this.counters.increment('parseFailures');
      return { kind: 'unrecognized', reason: `parser threw: ${describeError(error)}` };
    }
  }

  private toResult(
    source: MapSource,
    sector: Sector,
    outcome: ExtractionOutcome,
    attempts: FetchAttempt[]
  ): SectorResult {
    const base = { sectorId: sector.id, sourceTag: source.tag, attempts };

    switch (outcome.kind) {
      case 'records':
        this.counters.increment('recordsFound', outcome.records.length);
        return { ...base, status: 'ok', records: outcome.records };
      case 'no-data':
        return { ...base, status: 'no-data', records: [] };
      case 'unrecognized':
        this.counters.increment('shapeUnrecognized');
        logger.warn('Unrecognized payload shape', { sector: sector.id, source: source.tag, reason: outcome.reason });
        return { ...base, status: 'unrecognized', records: [] };
    }
  }
}
