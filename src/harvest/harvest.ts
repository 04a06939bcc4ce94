/**
 * Harvest orchestration: grid -> batched fetches -> aggregation
 */

import { differenceInMilliseconds } from 'date-fns';
import type { CanonicalRecord, GridStats, HttpTransport, RunProfile, SectorStatus } from '../types.js';
import { loadCountryConfig } from '../config/index.js';
import { buildLandGrid } from '../grid/partition.js';
import { getSource } from '../sources/index.js';
import { Aggregator } from '../aggregate/dedup.js';
import { FetchEngine } from '../fetch/engine.js';
import { RunCounters, type CounterSnapshot } from '../fetch/counters.js';
import { ProxyRotator } from '../fetch/proxies.js';
import { createTransport } from '../fetch/transport.js';
import type { SleepFn } from '../util/backoff.js';
import { logger } from '../util/logger.js';

export interface HarvestOptions {
  country: string;
  query: string;
  sources: string[];
  gridSize: number;
  maxSectors?: number;
  profile: RunProfile;
  proxies: string[];
}

export interface HarvestDeps {
  transport?: HttpTransport;
  sleep?: SleepFn;
  random?: () => number;
  /** Invoked every `gcEvery` batches */
  onCheckpoint?: (batchIndex: number) => void;
}

export interface HarvestResult {
  records: CanonicalRecord[];
  counters: CounterSnapshot;
  grid: GridStats;
  sectorsQueued: number;
  statusCounts: Record<SectorStatus, number>;
  exhaustedSectors: Array<{ source: string; sectorId: string }>;
  sourceBreakdown: Record<string, number>;
  durationMs: number;
}

/**
 * Release what can be released between batches
 */
export function defaultCheckpoint(batchIndex: number): void {
  const gc: unknown = Reflect.get(globalThis, 'gc');
  if (typeof gc === 'function') {
    gc();
  }
  const { heapUsed } = process.memoryUsage();
  logger.debug('Batch checkpoint', { batchIndex, heapUsedMb: Math.round(heapUsed / 1024 / 1024) });
}

/**
 * Run a full harvest. Configuration problems throw before any request is
 * made; everything else degrades into counters and smaller output.
 */
export async function runHarvest(options: HarvestOptions, deps: HarvestDeps = {}): Promise<HarvestResult> {
  const country = loadCountryConfig(options.country);
  const sources = options.sources.map(name => getSource(name));

  const startedAt = new Date();
  const { sectors: landSectors, stats: grid } = buildLandGrid(country, options.gridSize);
  const sectors = options.maxSectors !== undefined ? landSectors.slice(0, options.maxSectors) : landSectors;

  logger.info('Grid ready', {
    country: grid.country,
    total: grid.totalSectors,
    land: grid.landSectors,
    waterEliminated: `${(grid.landEliminationRatio * 100).toFixed(1)}%`,
    queued: sectors.length,
  });

  const { profile } = options;
  const transport = deps.transport ?? createTransport({
    maxProxyAgents: profile.poolSize,
    perHostConnections: profile.perHostConnections,
  });
  const engine = new FetchEngine({
    profile,
    transport,
    rotator: new ProxyRotator(options.proxies),
    counters: new RunCounters(),
    sleep: deps.sleep,
    random: deps.random,
  });
  const checkpoint = deps.onCheckpoint ?? defaultCheckpoint;

  const aggregator = new Aggregator();
  const statusCounts: Record<SectorStatus, number> = { 'ok': 0, 'no-data': 0, 'unrecognized': 0, 'exhausted': 0 };
  const exhaustedSectors: Array<{ source: string; sectorId: string }> = [];

  logger.info(`Harvesting with profile ${profile.name}`, {
    description: profile.description,
    concurrent: profile.maxConcurrent,
    delayMs: profile.delayRangeMs,
    proxies: options.proxies.length,
    sources: sources.map(s => s.tag),
  });

  try {
    for (const source of sources) {
      let batchIndex = 0;
      for (let i = 0; i < sectors.length; i += profile.batchSize, batchIndex++) {
        const batch = sectors.slice(i, i + profile.batchSize);
        const results = await engine.fetchBatch(source, batch, options.query);

        for (const result of results) {
          statusCounts[result.status]++;
          if (result.status === 'exhausted') {
            exhaustedSectors.push({ source: result.sourceTag, sectorId: result.sectorId });
          }
          aggregator.add(result.records);
        }

        const done = Math.min(i + profile.batchSize, sectors.length);
        const elapsedSec = differenceInMilliseconds(new Date(), startedAt) / 1000;
        logger.info(`[${source.tag}] ${done}/${sectors.length} sectors`, {
          progress: `${((done / Math.max(1, sectors.length)) * 100).toFixed(1)}%`,
          found: aggregator.size,
          rate: elapsedSec > 0 ? Number((done / elapsedSec).toFixed(1)) : 0,
        });

        if (batchIndex % profile.gcEvery === 0) {
          checkpoint(batchIndex);
        }
      }
    }
  } finally {
    if (!deps.transport) {
      await transport.close();
    }
  }

  if (exhaustedSectors.length > 0) {
    logger.warn(`${exhaustedSectors.length} sector fetches exhausted their attempts`, {
      sample: exhaustedSectors.slice(0, 10).map(s => `${s.source}:${s.sectorId}`),
    });
  }

  const counters = engine.counters.snapshot();
  if (counters.shapeUnrecognized > 0) {
    logger.warn('Some payloads had an unrecognized shape; sources may have changed format', {
      shapeUnrecognized: counters.shapeUnrecognized,
      parseFailures: counters.parseFailures,
    });
  }

  return {
    records: aggregator.results(),
    counters,
    grid,
    sectorsQueued: sectors.length,
    statusCounts,
    exhaustedSectors,
    sourceBreakdown: aggregator.sourceBreakdown(),
    durationMs: differenceInMilliseconds(new Date(), startedAt),
  };
}
