/**
 * Source registry
 */

import { ConfigError } from '../types.js';
import type { MapSource } from './types.js';
import { MapsSearchSource } from './maps-search.js';
import { OverpassSource } from './overpass.js';

const FACTORIES: Record<string, () => MapSource> = {
  'maps-search': () => new MapsSearchSource(),
  'overpass': () => new OverpassSource(),
};

export function availableSources(): string[] {
  return Object.keys(FACTORIES);
}

export function getSource(name: string): MapSource {
  const factory = FACTORIES[name.trim().toLowerCase()];
  if (!factory) {
    throw new ConfigError(`Unknown source '${name}'. Available: ${availableSources().join(', ')}`);
  }
  return factory();
}

export type { MapSource } from './types.js';
export { MapsSearchSource, SEARCH_HOSTS } from './maps-search.js';
export { OverpassSource, buildOverpassQuery } from './overpass.js';
