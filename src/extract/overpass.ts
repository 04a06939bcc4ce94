/**
 * Structured parser for Overpass API (OpenStreetMap) responses
 */

import type { ExtractedRecord, ExtractionOutcome, Sector } from '../types.js';
import { isRecord } from './tree.js';
import { coordinateId, toFiniteNumber } from './places.js';

const CATEGORY_TAGS = ['amenity', 'shop', 'tourism', 'office', 'craft'];

function tag(tags: Readonly<Record<string, unknown>>, key: string): string {
  const value = tags[key];
  return typeof value === 'string' ? value.trim() : '';
}

export function buildOsmAddress(tags: Readonly<Record<string, unknown>>): string {
  const parts: string[] = [];
  const street = tag(tags, 'addr:street');
  if (street) {
    const houseNumber = tag(tags, 'addr:housenumber');
    parts.push(houseNumber ? `${street} ${houseNumber}` : street);
  }
  const city = tag(tags, 'addr:city');
  if (city) {
    parts.push(city);
  }
  return parts.join(', ');
}

function elementLocation(element: Readonly<Record<string, unknown>>, sector: Sector): { lat: number; lng: number } {
  const lat = toFiniteNumber(element.lat);
  const lng = toFiniteNumber(element.lon);
  if (lat !== undefined && lng !== undefined) {
    return { lat, lng };
  }
  const center = element.center;
  if (isRecord(center)) {
    const centerLat = toFiniteNumber(center.lat);
    const centerLng = toFiniteNumber(center.lon);
    if (centerLat !== undefined && centerLng !== undefined) {
      return { lat: centerLat, lng: centerLng };
    }
  }
  return { lat: sector.center.lat, lng: sector.center.lng };
}

function elementId(element: Readonly<Record<string, unknown>>): string {
  const id = element.id;
  if (typeof id !== 'number' && typeof id !== 'string') {
    return '';
  }
  const type = typeof element.type === 'string' ? element.type : '';
  return type ? `${type}/${id}` : String(id);
}

/**
 * Parse an Overpass `[out:json]` document. Elements without a name, or whose
 * name was already seen in this payload, are skipped.
 */
export function parseOverpass(payload: unknown, sector: Sector, sourceTag: string): ExtractionOutcome {
  if (!isRecord(payload) || !Array.isArray(payload.elements)) {
    return { kind: 'unrecognized', reason: 'missing elements array' };
  }

  const records: ExtractedRecord[] = [];
  const seenNames = new Set<string>();

  for (const element of payload.elements) {
    if (!isRecord(element) || !isRecord(element.tags)) {
      continue;
    }
    const tags = element.tags;
    const name = tag(tags, 'name');
    if (!name || seenNames.has(name)) {
      continue;
    }
    seenNames.add(name);

    const location = elementLocation(element, sector);
    const categoryKey = CATEGORY_TAGS.find(key => tag(tags, key));
    const openingHours = tag(tags, 'opening_hours');

    records.push({
      name,
      address: buildOsmAddress(tags),
      phone: tag(tags, 'phone') || tag(tags, 'contact:phone'),
      website: tag(tags, 'website') || tag(tags, 'contact:website'),
      category: categoryKey ? tag(tags, categoryKey) : 'business',
      rating: 0,
      reviewCount: 0,
      location,
      sourceId: elementId(element) || coordinateId(location),
      sourceTag,
      hours: openingHours ? { opening_hours: openingHours } : {},
    });
  }

  return records.length > 0 ? { kind: 'records', records } : { kind: 'no-data' };
}
