#!/usr/bin/env node

/**
 * Business export runner
 */

import { config } from 'dotenv';
import { parseArgs } from 'util';
import { mkdir, writeFile } from 'node:fs/promises';
import { resolve } from 'path';
import { createStorage } from '../storage/index.js';
import { logger, describeError } from '../util/logger.js';
import { businessesToCSV, businessesToJSON } from '../util/csv.js';
import { failUsage, isEntryPoint, printHelp } from '../util/cli.js';
import { ConfigError, type ExportArgs, type StoredBusiness } from '../types.js';

// Load environment variables
config();

const FORMATS: ReadonlyArray<ExportArgs['format']> = ['csv', 'json', 'both'];

const HELP = `
Usage: npm run export -- --country <name> [--format csv|json|both] [--out <dir>]

Options:
  -c, --country <name>   Country to export, also used for the file names (required)
  -f, --format <format>  csv, json or both (default: both)
  -o, --out <dir>        Output directory (default: $OUTPUT_DIR or output)
  -h, --help             Show this help message

Examples:
  npm run export -- --country spain
  npm run export -- --country spain --format csv --out out/
`;

export function parseExportArgs(argv: string[]): ExportArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      country: { type: 'string', short: 'c' },
      format: { type: 'string', short: 'f' },
      out: { type: 'string', short: 'o' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help) {
    printHelp(HELP);
  }

  if (!values.country) {
    throw new ConfigError('--country is required');
  }

  const requested = values.format ?? 'both';
  const format = FORMATS.find(f => f === requested);
  if (!format) {
    throw new ConfigError(`--format must be one of ${FORMATS.join(', ')}, got '${requested}'`);
  }

  return {
    country: values.country.toLowerCase(),
    format,
    out: values.out ?? process.env.OUTPUT_DIR ?? 'output',
  };
}

/**
 * Write `<country>_businesses.csv` and/or `.json` into `outputDir`
 */
export async function writeExports(
  rows: readonly StoredBusiness[],
  country: string,
  outputDir: string,
  format: ExportArgs['format']
): Promise<string[]> {
  const dir = resolve(process.cwd(), outputDir);
  await mkdir(dir, { recursive: true });

  const base = resolve(dir, `${country.toLowerCase()}_businesses`);
  const written: string[] = [];

  if (format === 'csv' || format === 'both') {
    await writeFile(`${base}.csv`, await businessesToCSV(rows), 'utf-8');
    written.push(`${base}.csv`);
  }
  if (format === 'json' || format === 'both') {
    await writeFile(`${base}.json`, businessesToJSON(rows), 'utf-8');
    written.push(`${base}.json`);
  }

  return written;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  let args: ExportArgs;
  try {
    args = parseExportArgs(argv);
  } catch (error) {
    failUsage(describeError(error));
  }

  const timer = logger.timer('Export');
  const storage = await createStorage();
  try {
    const rows = await storage.all(args.country);
    if (rows.length === 0) {
      logger.warn(`No businesses stored for ${args.country}; run the harvest first`);
    }

    const files = await writeExports(rows, args.country, args.out, args.format);
    const stats = await storage.getStats();
    logger.info(`Exported ${rows.length} businesses`, {
      files,
      topCategories: stats.top_categories.slice(0, 5),
      totalReviews: stats.total_reviews,
    });
  } finally {
    await storage.close();
  }
  timer();
}

if (isEntryPoint(import.meta.url)) {
  main()
    .then(() => process.exit(0))
    .catch((error) => {
      logger.error('Export failed', { error: describeError(error) });
      process.exit(1);
    });
}
