#!/usr/bin/env node

/**
 * Harvest runner: grid -> fetch -> dedup -> storage -> CSV/JSON
 */

import { config } from 'dotenv';
import { parseArgs } from 'util';
import { formatISO } from 'date-fns';
import { runHarvest, type HarvestResult } from './harvest.js';
import { loadProxyFile } from '../fetch/proxies.js';
import { resolveProfile } from '../fetch/profiles.js';
import { createStorage } from '../storage/index.js';
import { writeExports } from '../export/run.js';
import { availableSources } from '../sources/index.js';
import { getAvailableCountries } from '../config/index.js';
import { failUsage, isEntryPoint, parseList, parseMode, parsePositiveInt, printHelp } from '../util/cli.js';
import { logger, describeError } from '../util/logger.js';
import { ConfigError, type HarvestArgs } from '../types.js';

// Load environment variables
config();

export const DEFAULT_GRID_SIZE = 165;
export const DEFAULT_QUERY = 'negocios';
export const TEST_GRID_SIZE = 20;
export const TEST_MAX_SECTORS = 20;

const HELP = `
Usage: npm run harvest -- --country <name> [options]

Options:
  -c, --country <name>     Country config under configs/countries (required)
  -q, --query <text>       Search query (default: ${DEFAULT_QUERY})
  -s, --source <list>      Comma-separated sources (default: maps-search)
  -p, --proxy-file <path>  Proxy list, one per line (default: $PROXY_FILE or proxies.txt)
  -m, --mode <mode>        auto | fast | medium | slow (default: auto)
  -g, --grid-size <n>      Grid cells per side (default: ${DEFAULT_GRID_SIZE})
      --max-sectors <n>    Only fetch the first n land sectors
      --test               Small run: ${TEST_GRID_SIZE}x${TEST_GRID_SIZE} grid, ${TEST_MAX_SECTORS} sectors
  -h, --help               Show this help message

Examples:
  npm run harvest -- --country spain --test
  npm run harvest -- --country spain --source maps-search,overpass --mode medium
`;

export function parseHarvestArgs(argv: string[]): HarvestArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      country: { type: 'string', short: 'c' },
      query: { type: 'string', short: 'q' },
      source: { type: 'string', short: 's' },
      'proxy-file': { type: 'string', short: 'p' },
      mode: { type: 'string', short: 'm' },
      'grid-size': { type: 'string', short: 'g' },
      'max-sectors': { type: 'string' },
      test: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help) {
    printHelp(HELP);
  }

  if (!values.country) {
    throw new ConfigError(`--country is required. Available: ${getAvailableCountries().join(', ')}`);
  }

  const test = values.test ?? false;

  return {
    country: values.country,
    query: values.query ?? DEFAULT_QUERY,
    sources: parseList(values.source, ['maps-search']),
    proxyFile: values['proxy-file'],
    mode: parseMode(values.mode),
    gridSize: test ? TEST_GRID_SIZE : parsePositiveInt(values['grid-size'], 'grid-size') ?? DEFAULT_GRID_SIZE,
    maxSectors: test ? TEST_MAX_SECTORS : parsePositiveInt(values['max-sectors'], 'max-sectors'),
  };
}

function logSummary(result: HarvestResult): void {
  const { counters } = result;
  const successRate = counters.requests > 0 ? (counters.successes / counters.requests) * 100 : 0;

  logger.info('Harvest complete', {
    durationSec: Number((result.durationMs / 1000).toFixed(1)),
    sectors: result.sectorsQueued,
    businesses: result.records.length,
    bySource: result.sourceBreakdown,
    sectorStatus: result.statusCounts,
  });
  logger.info('Request statistics', {
    ...counters,
    successRate: `${successRate.toFixed(1)}%`,
  });
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  let args: HarvestArgs;
  try {
    args = parseHarvestArgs(argv);
  } catch (error) {
    failUsage(describeError(error));
  }

  const proxyFile = args.proxyFile ?? process.env.PROXY_FILE ?? 'proxies.txt';
  const proxies = await loadProxyFile(proxyFile);
  const profile = resolveProfile(args.mode, proxies.length);

  logger.info('Starting harvest', {
    country: args.country,
    query: args.query,
    sources: args.sources,
    available: availableSources(),
    gridSize: args.gridSize,
    maxSectors: args.maxSectors,
    profile: profile.name,
  });

  const result = await runHarvest({
    country: args.country,
    query: args.query,
    sources: args.sources,
    gridSize: args.gridSize,
    maxSectors: args.maxSectors,
    profile,
    proxies,
  });
  logSummary(result);

  const storage = await createStorage();
  try {
    await storage.runMigrations();
    const saved = await storage.upsertMany(result.records, formatISO(new Date()), args.country);
    logger.info(`Saved ${saved} businesses`, { total: await storage.count() });

    const outputDir = process.env.OUTPUT_DIR || 'output';
    const files = await writeExports(await storage.all(args.country), args.country, outputDir, 'both');
    logger.info('Exported businesses', { files });
  } finally {
    await storage.close();
  }
}

if (isEntryPoint(import.meta.url)) {
  main()
    .then(() => process.exit(0))
    .catch((error) => {
      if (error instanceof ConfigError) {
        logger.error(`Configuration error: ${error.message}`);
      } else {
        logger.error('Harvest failed', { error: describeError(error), stack: error instanceof Error ? error.stack : undefined });
      }
      process.exit(1);
    });
}
