import { describe, it, expect } from 'vitest';
import { FetchEngine, REQUEST_TIMEOUT_MS } from '../../src/fetch/engine.js';
import { ProxyRotator } from '../../src/fetch/proxies.js';
import type { MapSource } from '../../src/sources/types.js';
import type { ExtractionOutcome } from '../../src/types.js';
import {
  FakeTransport,
  makeRecord,
  makeSector,
  recordingSleep,
  sequenceTransport,
  testProfile,
} from '../fixtures.js';

function fakeSource(parse: (body: string) => ExtractionOutcome): MapSource {
  return {
    tag: 'fake',
    description: 'scripted source',
    buildRequest: sector => ({ method: 'GET', url: `https://example.test/search/${sector.id}`, headers: {} }),
    parse: body => parse(body),
  };
}

const twoRecords = fakeSource(() => ({
  kind: 'records',
  records: [makeRecord({ sourceId: 'a' }), makeRecord({ sourceId: 'b' })],
}));

const sector = makeSector('3_4', 40, -3);
const ok = { status: 200, body: '{}' };

describe('FetchEngine', () => {
  it('should return records from a successful fetch', async () => {
    const { delays, sleep } = recordingSleep();
    const transport = sequenceTransport([ok]);
    const engine = new FetchEngine({ profile: testProfile, transport, sleep, random: () => 0 });

    const result = await engine.fetchSector(twoRecords, sector, 'cafes');

    expect(result.status).toBe('ok');
    expect(result.sectorId).toBe('3_4');
    expect(result.sourceTag).toBe('fake');
    expect(result.records.map(r => r.sourceId)).toEqual(['a', 'b']);
    expect(result.attempts).toEqual([
      { url: 'https://example.test/search/3_4', proxy: undefined, attempt: 0, outcome: 'success', statusCode: 200 },
    ]);
    expect(delays).toEqual([100]);
    expect(transport.sent[0]?.options).toEqual({ proxyUrl: undefined, timeoutMs: REQUEST_TIMEOUT_MS });
    expect(engine.counters.snapshot()).toMatchObject({ requests: 1, successes: 1, recordsFound: 2, retries: 0 });
  });

  it('should back off 1s, 2s, 4s and give up after three attempts', async () => {
    const { delays, sleep } = recordingSleep();
    const transport = sequenceTransport([{ status: 500, body: '' }]);
    const engine = new FetchEngine({ profile: testProfile, transport, sleep, random: () => 0 });

    const result = await engine.fetchSector(twoRecords, sector, 'cafes');

    expect(result.status).toBe('exhausted');
    expect(result.records).toEqual([]);
    expect(result.attempts.map(a => a.outcome)).toEqual(['retryable', 'retryable', 'retryable']);
    expect(transport.sent).toHaveLength(3);
    expect(delays).toEqual([100, 1000, 2000, 4000]);
    expect(engine.counters.snapshot()).toMatchObject({
      requests: 3,
      successes: 0,
      retries: 3,
      sectorsExhausted: 1,
    });
  });

  it('should mark a rate-limited proxy failed and retry on the next one', async () => {
    const { delays, sleep } = recordingSleep();
    const transport = sequenceTransport([{ status: 429, body: '' }, ok]);
    const rotator = new ProxyRotator(['A', 'B', 'C']);
    const engine = new FetchEngine({ profile: testProfile, transport, rotator, sleep, random: () => 0 });

    const result = await engine.fetchSector(twoRecords, sector, 'cafes');

    expect(result.status).toBe('ok');
    expect(transport.sent.map(s => s.options.proxyUrl)).toEqual(['http://A', 'http://B']);
    expect(result.attempts.map(a => [a.proxy, a.outcome])).toEqual([['A', 'rate-limited'], ['B', 'success']]);
    expect(rotator.snapshot().find(e => e.id === 'A')?.failed).toBe(true);
    expect(rotator.available()).toBe(2);
    expect(delays).toEqual([100, 1000]);
    expect(engine.counters.snapshot()).toMatchObject({ rateLimited: 1, retries: 1, successes: 1 });
  });

  it('should fall back to direct requests once every proxy has failed', async () => {
    const { sleep } = recordingSleep();
    const transport = sequenceTransport([{ status: 429, body: '' }, ok]);
    const rotator = new ProxyRotator(['A']);
    const engine = new FetchEngine({ profile: testProfile, transport, rotator, sleep, random: () => 0 });

    await engine.fetchSector(twoRecords, sector, 'cafes');

    expect(transport.sent.map(s => s.options.proxyUrl)).toEqual(['http://A', undefined]);
  });

  it('should count network failures and retry them', async () => {
    const { sleep } = recordingSleep();
    const transport = sequenceTransport([new Error('socket hang up'), ok]);
    const engine = new FetchEngine({ profile: testProfile, transport, sleep, random: () => 0 });

    const result = await engine.fetchSector(twoRecords, sector, 'cafes');

    expect(result.status).toBe('ok');
    expect(result.attempts[0]).toEqual({
      url: 'https://example.test/search/3_4',
      proxy: undefined,
      attempt: 0,
      outcome: 'retryable',
    });
    expect(engine.counters.snapshot()).toMatchObject({ requests: 2, networkFailures: 1, retries: 1, successes: 1 });
  });

  it('should report an unrecognized payload without retrying', async () => {
    const { delays, sleep } = recordingSleep();
    const transport = sequenceTransport([ok]);
    const source = fakeSource(() => ({ kind: 'unrecognized', reason: 'layout changed' }));
    const engine = new FetchEngine({ profile: testProfile, transport, sleep, random: () => 0 });

    const result = await engine.fetchSector(source, sector, 'cafes');

    expect(result.status).toBe('unrecognized');
    expect(result.records).toEqual([]);
    expect(delays).toEqual([100]);
    expect(engine.counters.snapshot()).toMatchObject({ shapeUnrecognized: 1, parseFailures: 0, retries: 0 });
  });

  it('should contain a throwing parser', async () => {
    const { sleep } = recordingSleep();
    const transport = sequenceTransport([ok]);
    const source = fakeSource(() => {
      throw new SyntaxError('Unexpected token');
    });
    const engine = new FetchEngine({ profile: testProfile, transport, sleep, random: () => 0 });

    const result = await engine.fetchSector(source, sector, 'cafes');

    expect(result.status).toBe('unrecognized');
    expect(engine.counters.snapshot()).toMatchObject({ parseFailures: 1, shapeUnrecognized: 1, successes: 1 });
  });

  it('should distinguish an empty answer from a failure', async () => {
    const { sleep } = recordingSleep();
    const source = fakeSource(() => ({ kind: 'no-data' }));
    const engine = new FetchEngine({ profile: testProfile, transport: sequenceTransport([ok]), sleep, random: () => 0 });

    const result = await engine.fetchSector(source, sector, 'cafes');

    expect(result.status).toBe('no-data');
    expect(engine.counters.snapshot()).toMatchObject({ shapeUnrecognized: 0, sectorsExhausted: 0, recordsFound: 0 });
  });

  it('should never run more fetches at once than the profile allows', async () => {
    const { sleep } = recordingSleep();
    let inFlight = 0;
    let maxInFlight = 0;
    const transport = new FakeTransport(async () => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise(resolve => setTimeout(resolve, 5));
      inFlight--;
      return ok;
    });
    const engine = new FetchEngine({ profile: testProfile, transport, sleep, random: () => 0 });
    const sectors = [0, 1, 2, 3, 4, 5].map(i => makeSector(`0_${i}`, 40, i));

    const results = await engine.fetchBatch(twoRecords, sectors, 'cafes');

    expect(results.map(r => r.sectorId)).toEqual(['0_0', '0_1', '0_2', '0_3', '0_4', '0_5']);
    expect(maxInFlight).toBe(2);
    expect(engine.activeCount).toBe(0);
    expect(engine.counters.get('requests')).toBe(6);
  });

  it('should use the injected attempt budget and base delay', async () => {
    const { delays, sleep } = recordingSleep();
    const transport = sequenceTransport([{ status: 503, body: '' }]);
    const engine = new FetchEngine({
      profile: testProfile,
      transport,
      sleep,
      random: () => 1,
      maxAttempts: 2,
      backoffBaseMs: 10,
    });

    const result = await engine.fetchSector(twoRecords, sector, 'cafes');

    expect(result.status).toBe('exhausted');
    expect(delays).toEqual([200, 10, 20]);
  });
});
