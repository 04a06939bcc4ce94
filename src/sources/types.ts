import type { ExtractionOutcome, HttpRequest, Sector } from '../types.js';

/**
 * A map-data source: how to ask it about one sector and how to read its answer
 */
export interface MapSource {
  readonly tag: string;
  readonly description: string;
  buildRequest(sector: Sector, query: string, random: () => number): HttpRequest;
  parse(body: string, sector: Sector): ExtractionOutcome;
}
