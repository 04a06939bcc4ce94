/**
 * Map search source: HTML result pages with embedded place documents
 */

import type { ExtractionOutcome, HttpRequest, Sector } from '../types.js';
import type { MapSource } from './types.js';
import { browserHeaders, pick } from './headers.js';
import { findEmbeddedPayloads } from '../extract/embedded.js';
import { dedupeWithinPayload, extractPlaces, type PlaceExtractionOptions } from '../extract/places.js';

export const SEARCH_HOSTS = ['https://www.google.com/search', 'https://www.google.es/search'] as const;

export class MapsSearchSource implements MapSource {
  readonly tag = 'maps-search';
  readonly description = 'Map search result pages (embedded JSON)';

  constructor(private readonly extraction: Omit<PlaceExtractionOptions, 'sourceTag'> = {}) {}

  buildRequest(sector: Sector, query: string, random: () => number): HttpRequest {
    const params = new URLSearchParams({
      tbm: 'map',
      tch: '1',
      q: `${query} @${sector.center.lat},${sector.center.lng}`,
      hl: 'es',
    });

    return {
      method: 'GET',
      url: `${pick(SEARCH_HOSTS, random)}?${params.toString()}`,
      headers: browserHeaders(random, 'text/html,*/*;q=0.8'),
    };
  }

  parse(body: string, sector: Sector): ExtractionOutcome {
    const scan = findEmbeddedPayloads(body);

    if (scan.payloads.length === 0) {
      return {
        kind: 'unrecognized',
        reason: scan.failures.length > 0 ? scan.failures.join('; ') : 'no embedded payload found',
      };
    }

    const records = dedupeWithinPayload(
      scan.payloads.flatMap(payload =>
        extractPlaces(payload, sector.center, { ...this.extraction, sourceTag: this.tag })
      )
    );

    return records.length > 0 ? { kind: 'records', records } : { kind: 'no-data' };
  }
}
