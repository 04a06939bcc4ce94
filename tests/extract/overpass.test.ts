import { describe, it, expect } from 'vitest';
import { buildOsmAddress, parseOverpass } from '../../src/extract/overpass.js';
import { makeSector } from '../fixtures.js';

const sector = makeSector('5_5', 40.5, -3.5);

describe('Overpass parsing', () => {
  describe('buildOsmAddress', () => {
    it('should join street, house number and city', () => {
      expect(buildOsmAddress({
        'addr:street': 'Calle Mayor',
        'addr:housenumber': '5',
        'addr:city': 'Madrid',
      })).toBe('Calle Mayor 5, Madrid');
    });

    it('should tolerate missing parts', () => {
      expect(buildOsmAddress({ 'addr:street': 'Gran Via' })).toBe('Gran Via');
      expect(buildOsmAddress({ 'addr:city': 'Sevilla', 'addr:housenumber': '9' })).toBe('Sevilla');
      expect(buildOsmAddress({})).toBe('');
    });
  });

  describe('parseOverpass', () => {
    const payload = {
      version: 0.6,
      elements: [
        {
          type: 'node',
          id: 1,
          lat: 40.1,
          lon: -3.1,
          tags: {
            name: 'Bar Uno',
            amenity: 'bar',
            'addr:street': 'Calle Mayor',
            'addr:housenumber': '5',
            'addr:city': 'Madrid',
            phone: '+34 910 000 000',
            opening_hours: 'Mo-Fr 09:00-18:00',
          },
        },
        {
          type: 'way',
          id: 2,
          center: { lat: 40.2, lon: -3.2 },
          tags: { name: 'Panaderia', shop: 'bakery', 'contact:website': 'https://panaderia.example' },
        },
        { type: 'node', id: 3, lat: 40.3, lon: -3.3, tags: { amenity: 'bench' } },
        { type: 'node', id: 4, lat: 40.4, lon: -3.4, tags: { name: 'Bar Uno', amenity: 'bar' } },
        { type: 'node', id: 5, lat: 40.5, lon: -3.5 },
        { type: 'relation', id: 6, tags: { name: 'Oficina', office: 'company' } },
        { type: 'node', id: 7, lat: 41, lon: -4, tags: { name: 'Sin Tipo' } },
      ],
    };

    it('should map named elements to records', () => {
      const outcome = parseOverpass(payload, sector, 'overpass');
      if (outcome.kind !== 'records') throw new Error(`unexpected outcome ${outcome.kind}`);

      expect(outcome.records.map(r => r.name)).toEqual(['Bar Uno', 'Panaderia', 'Oficina', 'Sin Tipo']);
      expect(outcome.records[0]).toEqual({
        name: 'Bar Uno',
        address: 'Calle Mayor 5, Madrid',
        phone: '+34 910 000 000',
        website: '',
        category: 'bar',
        rating: 0,
        reviewCount: 0,
        location: { lat: 40.1, lng: -3.1 },
        sourceId: 'node/1',
        sourceTag: 'overpass',
        hours: { opening_hours: 'Mo-Fr 09:00-18:00' },
      });
    });

    it('should use way centers and contact tags', () => {
      const outcome = parseOverpass(payload, sector, 'overpass');
      if (outcome.kind !== 'records') throw new Error(`unexpected outcome ${outcome.kind}`);

      expect(outcome.records[1]).toMatchObject({
        location: { lat: 40.2, lng: -3.2 },
        website: 'https://panaderia.example',
        category: 'bakery',
        sourceId: 'way/2',
        hours: {},
      });
    });

    it('should fall back to the sector center and a generic category', () => {
      const outcome = parseOverpass(payload, sector, 'overpass');
      if (outcome.kind !== 'records') throw new Error(`unexpected outcome ${outcome.kind}`);

      expect(outcome.records[2]?.location).toEqual({ lat: 40.5, lng: -3.5 });
      expect(outcome.records[2]?.category).toBe('company');
      expect(outcome.records[3]?.category).toBe('business');
    });

    it('should report no data for an empty element list', () => {
      expect(parseOverpass({ elements: [] }, sector, 'overpass')).toEqual({ kind: 'no-data' });
    });

    it('should not recognize a document without elements', () => {
      expect(parseOverpass({ remark: 'runtime error' }, sector, 'overpass')).toEqual({
        kind: 'unrecognized',
        reason: 'missing elements array',
      });
      expect(parseOverpass([], sector, 'overpass').kind).toBe('unrecognized');
    });
  });
});
