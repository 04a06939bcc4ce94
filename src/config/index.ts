/**
 * Configuration loader and manager
 */

import { readFileSync, readdirSync } from 'fs';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { validateCountryConfig, type CountryConfig } from './schema.js';
import { ConfigError } from '../types.js';
import { logger } from '../util/logger.js';

/**
 * Cache for loaded configurations
 */
const configCache = new Map<string, CountryConfig>();

function countriesDir(): string {
  return resolve(process.cwd(), 'configs', 'countries');
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Load and validate a country configuration from YAML file
 */
export function loadCountryConfig(countryName: string): CountryConfig {
  const key = countryName.trim().toLowerCase();

  const cached = configCache.get(key);
  if (cached) {
    return cached;
  }

  const configPath = resolve(countriesDir(), `${key}.yaml`);

  try {
    logger.debug(`Loading config from ${configPath}`);

    const yamlContent = readFileSync(configPath, 'utf-8');
    const rawConfig: unknown = parseYaml(yamlContent);

    const processedConfig = substituteEnvVars(rawConfig);

    const validation = validateCountryConfig(processedConfig);

    if (!validation.success || !validation.data) {
      throw new ConfigError(
        `Invalid configuration for country '${countryName}':\n${validation.errors.join('\n')}`
      );
    }

    const config = validation.data;
    configCache.set(key, config);

    logger.info(`Loaded configuration for country: ${config.display_name}`, {
      rules: config.rules.length,
    });

    return config;

  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }

    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ConfigError(
        `Country '${countryName}' not supported. Available: ${getAvailableCountries().join(', ')}`
      );
    }

    throw new ConfigError(`Failed to load configuration for '${countryName}': ${error}`);
  }
}

/**
 * Get all available country configurations
 */
export function getAvailableCountries(): string[] {
  try {
    return readdirSync(countriesDir())
      .filter((file: string) => file.endsWith('.yaml'))
      .map((file: string) => file.replace('.yaml', ''))
      .sort();
  } catch (error) {
    logger.warn('Could not read configs directory', { error });
    return [];
  }
}

/**
 * Clear configuration cache
 */
export function clearConfigCache(): void {
  configCache.clear();
  logger.debug('Configuration cache cleared');
}

/**
 * Substitute ${VAR_NAME} environment references in configuration values
 */
export function substituteEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([^}]+)\}/g, (match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        logger.warn(`Environment variable not found: ${varName}`);
        return match;
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map(item => substituteEnvVars(item));
  }

  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = substituteEnvVars(entry);
    }
    return result;
  }

  return value;
}

export type { CountryConfig, RawLandRule, RawRegion } from './schema.js';
