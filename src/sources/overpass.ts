/**
 * OpenStreetMap source via the Overpass API
 */

import type { ExtractionOutcome, HttpRequest, Sector } from '../types.js';
import type { MapSource } from './types.js';
import { browserHeaders } from './headers.js';
import { parseOverpass } from '../extract/overpass.js';
import { dedupeWithinPayload } from '../extract/places.js';

export const OVERPASS_URL = 'https://overpass-api.de/api/interpreter';
export const DEFAULT_RADIUS_METERS = 2000;

/**
 * Named amenities and shops around the sector center. The free-text query is
 * not used: Overpass filters on tags.
 */
export function buildOverpassQuery(sector: Sector, radiusMeters: number = DEFAULT_RADIUS_METERS): string {
  const around = `(around:${radiusMeters},${sector.center.lat},${sector.center.lng})`;
  return [
    '[out:json][timeout:25];',
    '(',
    `  node["name"]["amenity"]${around};`,
    `  way["name"]["amenity"]${around};`,
    `  node["name"]["shop"]${around};`,
    `  way["name"]["shop"]${around};`,
    ');',
    'out body center;',
  ].join('\n');
}

export class OverpassSource implements MapSource {
  readonly tag = 'overpass';
  readonly description = 'OpenStreetMap Overpass API';

  constructor(private readonly radiusMeters: number = DEFAULT_RADIUS_METERS) {}

  buildRequest(sector: Sector, _query: string, random: () => number): HttpRequest {
    return {
      method: 'POST',
      url: OVERPASS_URL,
      headers: {
        ...browserHeaders(random, 'application/json'),
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: new URLSearchParams({ data: buildOverpassQuery(sector, this.radiusMeters) }).toString(),
    };
  }

  parse(body: string, sector: Sector): ExtractionOutcome {
    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch (error) {
      return { kind: 'unrecognized', reason: `invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
    }

    const outcome = parseOverpass(payload, sector, this.tag);
    if (outcome.kind !== 'records') {
      return outcome;
    }
    return { kind: 'records', records: dedupeWithinPayload(outcome.records) };
  }
}
