/**
 * Geographic grid generation and land filtering
 */

import { ConfigError, type Bounds, type GridStats, type Sector } from '../types.js';
import type { CountryConfig } from '../config/index.js';
import { isLandPoint, toBounds } from './land.js';

/**
 * Split a bounding box into gridSize x gridSize sectors, row-major from the
 * south-west corner. Every sector starts out as land until classified.
 */
export function generateSectors(bounds: Bounds, gridSize: number): Sector[] {
  if (!Number.isInteger(gridSize) || gridSize <= 0) {
    throw new ConfigError(`Grid size must be a positive integer, got ${gridSize}`);
  }

  const latStep = (bounds.maxLat - bounds.minLat) / gridSize;
  const lngStep = (bounds.maxLng - bounds.minLng) / gridSize;

  const sectors: Sector[] = [];
  for (let row = 0; row < gridSize; row++) {
    for (let col = 0; col < gridSize; col++) {
      const latMin = bounds.minLat + row * latStep;
      const lngMin = bounds.minLng + col * lngStep;
      sectors.push(Object.freeze({
        id: `${row}_${col}`,
        center: Object.freeze({ lat: latMin + latStep / 2, lng: lngMin + lngStep / 2 }),
        bounds: Object.freeze({
          minLat: latMin,
          maxLat: bounds.minLat + (row + 1) * latStep,
          minLng: lngMin,
          maxLng: bounds.minLng + (col + 1) * lngStep,
        }),
        isLand: true,
      }));
    }
  }

  return sectors;
}

/**
 * Return a copy of the sector with its land flag decided by the country heuristics
 */
export function classifySector(sector: Sector, country: CountryConfig): Sector {
  return Object.freeze({ ...sector, isLand: isLandPoint(sector.center, country) });
}

export function filterLand(sectors: readonly Sector[]): Sector[] {
  return sectors.filter(sector => sector.isLand);
}

/**
 * Generate, classify and filter in one pass
 */
export function buildLandGrid(country: CountryConfig, gridSize: number): { sectors: Sector[]; stats: GridStats } {
  const all = generateSectors(toBounds(country.bounds), gridSize).map(s => classifySector(s, country));
  const land = filterLand(all);
  return { sectors: land, stats: gridStats(country.display_name, gridSize, land.length) };
}

export function gridStats(country: string, gridSize: number, landSectors: number): GridStats {
  const total = gridSize * gridSize;
  const water = total - landSectors;
  return {
    country,
    gridSize,
    totalSectors: total,
    landSectors,
    waterSectors: water,
    landEliminationRatio: total > 0 ? water / total : 0,
    estimatedRequests: landSectors,
  };
}
