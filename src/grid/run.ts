#!/usr/bin/env node

/**
 * Print grid statistics for a country without fetching anything
 */

import { config } from 'dotenv';
import { parseArgs } from 'util';
import { loadCountryConfig, getAvailableCountries } from '../config/index.js';
import { buildLandGrid } from './partition.js';
import { failUsage, isEntryPoint, parsePositiveInt, printHelp } from '../util/cli.js';
import { logger, describeError } from '../util/logger.js';
import { ConfigError } from '../types.js';

config();

const HELP = `
Usage: npm run grid -- --country <name> [--grid-size <n>]

Options:
  -c, --country <name>   Country config under configs/countries (required)
  -g, --grid-size <n>    Grid cells per side (default: 100)
  -h, --help             Show this help message
`;

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  let country: string;
  let gridSize: number;
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        country: { type: 'string', short: 'c' },
        'grid-size': { type: 'string', short: 'g' },
        help: { type: 'boolean', short: 'h' },
      },
    });
    if (values.help) {
      printHelp(HELP);
    }
    if (!values.country) {
      throw new ConfigError(`--country is required. Available: ${getAvailableCountries().join(', ')}`);
    }
    country = values.country;
    gridSize = parsePositiveInt(values['grid-size'], 'grid-size') ?? 100;
  } catch (error) {
    failUsage(describeError(error));
  }

  const { stats } = buildLandGrid(loadCountryConfig(country), gridSize);

  logger.info(`Grid for ${stats.country}`, {
    gridSize: `${stats.gridSize}x${stats.gridSize}`,
    totalSectors: stats.totalSectors,
    landSectors: stats.landSectors,
    waterSectors: stats.waterSectors,
    waterEliminated: `${(stats.landEliminationRatio * 100).toFixed(1)}%`,
    estimatedRequests: stats.estimatedRequests,
  });
}

if (isEntryPoint(import.meta.url)) {
  main()
    .then(() => process.exit(0))
    .catch((error) => {
      logger.error('Grid stats failed', { error: describeError(error) });
      process.exit(1);
    });
}
