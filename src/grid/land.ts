/**
 * Land/water heuristics driven by country configuration
 */

import type { RawLandRule, RawRegion, CountryConfig } from '../config/index.js';
import type { Bounds, LatLng } from '../types.js';
import type { RawBounds } from '../config/schema.js';

export type Verdict = 'land' | 'water';

export function toBounds(raw: RawBounds): Bounds {
  return {
    minLat: raw.min_lat,
    maxLat: raw.max_lat,
    minLng: raw.min_lng,
    maxLng: raw.max_lng,
  };
}

export function pointInBounds(point: LatLng, bounds: Bounds): boolean {
  return (
    bounds.minLat <= point.lat && point.lat <= bounds.maxLat &&
    bounds.minLng <= point.lng && point.lng <= bounds.maxLng
  );
}

/**
 * Ray casting over [lat, lng] vertices
 */
export function pointInPolygon(point: LatLng, vertices: ReadonlyArray<readonly [number, number]>): boolean {
  let inside = false;
  for (let i = 0, j = vertices.length - 1; i < vertices.length; j = i++) {
    const vi = vertices[i];
    const vj = vertices[j];
    if (!vi || !vj) continue;
    const [latI, lngI] = vi;
    const [latJ, lngJ] = vj;
    const crosses = (latI > point.lat) !== (latJ > point.lat);
    if (crosses && point.lng < ((lngJ - lngI) * (point.lat - latI)) / (latJ - latI) + lngI) {
      inside = !inside;
    }
  }
  return inside;
}

export function regionContains(region: RawRegion, point: LatLng): boolean {
  if ('polygon' in region) {
    return pointInPolygon(point, region.polygon);
  }

  const { min_lat, max_lat, min_lng, max_lng } = region.rect;
  if (min_lat !== undefined && point.lat < min_lat) return false;
  if (max_lat !== undefined && point.lat > max_lat) return false;
  if (min_lng !== undefined && point.lng < min_lng) return false;
  if (max_lng !== undefined && point.lng > max_lng) return false;
  return true;
}

/**
 * First matching rule wins; a rule's `except` list is consulted before its verdict
 */
export function evaluateRules(rules: readonly RawLandRule[], point: LatLng): { verdict: Verdict; rule: string } | null {
  for (const rule of rules) {
    if (!regionContains(rule.region, point)) {
      continue;
    }
    const exception = evaluateRules(rule.except ?? [], point);
    if (exception) {
      return { verdict: exception.verdict, rule: `${rule.name}.${exception.rule}` };
    }
    return { verdict: rule.verdict, rule: rule.name };
  }
  return null;
}

export function isLandPoint(point: LatLng, country: CountryConfig): boolean {
  const matched = evaluateRules(country.rules, point);
  if (matched) {
    return matched.verdict === 'land';
  }
  return pointInBounds(point, toBounds(country.land_bounds ?? country.bounds));
}
