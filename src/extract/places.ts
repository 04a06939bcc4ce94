/**
 * Schema-tolerant place extraction from deeply nested payloads
 */

import type { ExtractedRecord, LatLng } from '../types.js';
import { walkPayload } from './tree.js';

export const DEFAULT_MAX_DEPTH = 15;

const NAME_KEYS = ['title', 'name'];
const LAT_KEYS = ['lat', 'latitude'];
const LNG_KEYS = ['lng', 'longitude'];
const ADDRESS_KEYS = ['address', 'formattedAddress', 'formatted_address'];
const PHONE_KEYS = ['phone', 'phoneNumber', 'phone_number'];
const WEBSITE_KEYS = ['website', 'url'];
const CATEGORY_KEYS = ['category', 'type'];
const RATING_KEYS = ['rating', 'stars'];
const REVIEW_KEYS = ['reviews', 'reviewCount', 'reviewsCount'];
const ID_KEYS = ['placeId', 'place_id', 'id'];
const HOURS_KEYS = ['hours', 'openingHours', 'opening_hours'];

export interface PlaceExtractionOptions {
  sourceTag: string;
  maxDepth?: number;
  /** Keep visiting the children of a node that matched as a place */
  descendIntoMatches?: boolean;
  /** When false, named nodes without coordinates take the fallback location */
  requireCoordinates?: boolean;
}

type Entries = Readonly<Record<string, unknown>>;

function firstString(entries: Entries, keys: readonly string[]): string {
  for (const key of keys) {
    const value = entries[key];
    if (typeof value === 'string' && value.trim().length > 0) {
      return value.trim();
    }
  }
  return '';
}

export function toFiniteNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function firstNumber(entries: Entries, keys: readonly string[]): number | undefined {
  for (const key of keys) {
    const value = toFiniteNumber(entries[key]);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}

function firstId(entries: Entries, keys: readonly string[]): string {
  for (const key of keys) {
    const value = entries[key];
    if (typeof value === 'string' && value.length > 0) return value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  }
  return '';
}

export function coordinateId(location: LatLng): string {
  return `lat${location.lat}lng${location.lng}`;
}

/**
 * Build a record from a node that looks like a place, or null when it does not
 */
export function placeFromNode(
  entries: Entries,
  fallback: LatLng,
  sourceTag: string,
  requireCoordinates: boolean
): ExtractedRecord | null {
  const name = firstString(entries, NAME_KEYS);
  if (!name) {
    return null;
  }

  const lat = firstNumber(entries, LAT_KEYS);
  const lng = firstNumber(entries, LNG_KEYS);
  if (requireCoordinates && (lat === undefined || lng === undefined)) {
    return null;
  }

  const location = { lat: lat ?? fallback.lat, lng: lng ?? fallback.lng };
  const hoursKey = HOURS_KEYS.find(key => entries[key] !== undefined && entries[key] !== null);

  return {
    name,
    address: firstString(entries, ADDRESS_KEYS),
    phone: firstString(entries, PHONE_KEYS),
    website: firstString(entries, WEBSITE_KEYS),
    category: firstString(entries, CATEGORY_KEYS),
    rating: Math.max(0, firstNumber(entries, RATING_KEYS) ?? 0),
    reviewCount: Math.max(0, Math.trunc(firstNumber(entries, REVIEW_KEYS) ?? 0)),
    location,
    sourceId: firstId(entries, ID_KEYS) || coordinateId(location),
    sourceTag,
    hours: hoursKey ? entries[hoursKey] : {},
  };
}

/**
 * Collect every place-shaped object in the payload, in document order.
 * Matches are not deduplicated here.
 */
export function extractPlaces(
  payload: unknown,
  fallback: LatLng,
  options: PlaceExtractionOptions
): ExtractedRecord[] {
  const {
    sourceTag,
    maxDepth = DEFAULT_MAX_DEPTH,
    descendIntoMatches = true,
    requireCoordinates = true,
  } = options;

  const records: ExtractedRecord[] = [];

  walkPayload(payload, maxDepth, (node) => {
    const record = placeFromNode(node.entries, fallback, sourceTag, requireCoordinates);
    if (!record) {
      return 'descend';
    }
    records.push(record);
    return descendIntoMatches ? 'descend' : 'skip-children';
  });

  return records;
}

/**
 * Drop records whose identity repeats within one payload, first occurrence wins
 */
export function dedupeWithinPayload(records: readonly ExtractedRecord[]): ExtractedRecord[] {
  const seen = new Set<string>();
  const unique: ExtractedRecord[] = [];
  for (const record of records) {
    const identity = record.sourceId || coordinateId(record.location);
    if (seen.has(identity)) {
      continue;
    }
    seen.add(identity);
    unique.push(record);
  }
  return unique;
}
