/**
 * Shared CLI argument helpers
 */

import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { ConfigError, type ModeOption } from '../types.js';

const MODES: readonly ModeOption[] = ['auto', 'fast', 'medium', 'slow'];

export function parsePositiveInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`--${flag} must be a positive integer, got '${value}'`);
  }
  return parsed;
}

export function parseMode(value: string | undefined): ModeOption {
  if (value === undefined) {
    return 'auto';
  }
  const mode = MODES.find(m => m === value.toLowerCase());
  if (!mode) {
    throw new ConfigError(`--mode must be one of ${MODES.join(', ')}, got '${value}'`);
  }
  return mode;
}

/**
 * Comma-separated list, trimmed, empties dropped
 */
export function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  const items = value.split(',').map(item => item.trim()).filter(Boolean);
  return items.length > 0 ? items : fallback;
}

export function printHelp(help: string): never {
  console.log(help);
  process.exit(0);
}

export function failUsage(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

/**
 * True when `moduleUrl` is the script node was started with. The script path
 * is resolved first so a bin symlink still matches.
 */
export function isEntryPoint(moduleUrl: string, scriptPath: string | undefined = process.argv[1]): boolean {
  if (!scriptPath) {
    return false;
  }
  try {
    return moduleUrl === pathToFileURL(realpathSync(scriptPath)).href;
  } catch {
    return false;
  }
}
