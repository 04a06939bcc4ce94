/**
 * Cross-source deduplication of extracted records
 */

import type { CanonicalRecord, ExtractedRecord } from '../types.js';

const KEY_NAME_LENGTH = 20;

/**
 * Lower-case and strip everything that is not a letter or digit
 */
export function normalizeName(name: string): string {
  return name.toLowerCase().replace(/[^\p{L}\p{N}]/gu, '');
}

function roundCoordinate(value: number): string {
  const rounded = Math.round(value * 1000) / 1000;
  // collapse -0 so both sides of the meridian/equator agree
  return (rounded === 0 ? 0 : rounded).toFixed(3);
}

/**
 * Truncated normalized name plus coordinates rounded to three decimals
 */
export function dedupKey(record: Pick<ExtractedRecord, 'name' | 'location'>): string {
  const name = normalizeName(record.name).slice(0, KEY_NAME_LENGTH);
  return `${name}_${roundCoordinate(record.location.lat)}_${roundCoordinate(record.location.lng)}`;
}

/**
 * Whether `incoming` replaces `stored`: strictly longer address, or a phone
 * where the stored record has none. The winner is taken whole.
 */
export function isRicher(incoming: ExtractedRecord, stored: ExtractedRecord): boolean {
  if (incoming.address.length > stored.address.length) {
    return true;
  }
  return incoming.phone.length > 0 && stored.phone.length === 0;
}

function sourcesOf(record: ExtractedRecord | CanonicalRecord): readonly string[] {
  return 'sources' in record ? record.sources : [record.sourceTag];
}

function unionSources(left: readonly string[], right: readonly string[]): string[] {
  return [...new Set([...left, ...right])];
}

/**
 * Incremental merger holding the best record per dedup key
 */
export class Aggregator {
  private readonly byKey = new Map<string, CanonicalRecord>();

  add(records: Iterable<ExtractedRecord | CanonicalRecord>): void {
    for (const record of records) {
      this.addOne(record);
    }
  }

  addOne(record: ExtractedRecord | CanonicalRecord): void {
    const key = dedupKey(record);
    const stored = this.byKey.get(key);

    if (!stored) {
      this.byKey.set(key, { ...record, sources: [...sourcesOf(record)] });
      return;
    }

    const sources = unionSources(stored.sources, sourcesOf(record));
    const winner = isRicher(record, stored) ? record : stored;
    this.byKey.set(key, { ...winner, sources });
  }

  get size(): number {
    return this.byKey.size;
  }

  results(): CanonicalRecord[] {
    return [...this.byKey.values()];
  }

  /**
   * Canonical record count per winning source tag
   */
  sourceBreakdown(): Record<string, number> {
    const breakdown: Record<string, number> = {};
    for (const record of this.byKey.values()) {
      breakdown[record.sourceTag] = (breakdown[record.sourceTag] ?? 0) + 1;
    }
    return breakdown;
  }
}

/**
 * One-pass merge. Output keeps first-seen key order; running it on its own
 * output returns the same records.
 */
export function mergeRecords(records: Iterable<ExtractedRecord | CanonicalRecord>): CanonicalRecord[] {
  const aggregator = new Aggregator();
  aggregator.add(records);
  return aggregator.results();
}
