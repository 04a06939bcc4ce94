import type {
  ExtractedRecord,
  HttpRequest,
  HttpResponse,
  HttpTransport,
  RunProfile,
  Sector,
  SendOptions,
} from '../src/types.js';

export function makeSector(id: string, lat: number, lng: number): Sector {
  return {
    id,
    center: { lat, lng },
    bounds: { minLat: lat - 0.5, maxLat: lat + 0.5, minLng: lng - 0.5, maxLng: lng + 0.5 },
    isLand: true,
  };
}

export function makeRecord(overrides: Partial<ExtractedRecord> = {}): ExtractedRecord {
  return {
    name: 'Test Place',
    address: '',
    phone: '',
    website: '',
    category: '',
    rating: 0,
    reviewCount: 0,
    location: { lat: 40, lng: -3 },
    sourceId: 'place-1',
    sourceTag: 'test',
    hours: {},
    ...overrides,
  };
}

export const testProfile: RunProfile = {
  name: 'slow',
  maxConcurrent: 2,
  delayRangeMs: [100, 200],
  poolSize: 4,
  perHostConnections: 4,
  batchSize: 2,
  gcEvery: 2,
  description: 'test profile',
};

type Handler = (request: HttpRequest, options: SendOptions) => Promise<HttpResponse> | HttpResponse;

/**
 * In-process transport: answers from a handler and records what was sent
 */
export class FakeTransport implements HttpTransport {
  readonly sent: Array<{ request: HttpRequest; options: SendOptions }> = [];
  closed = false;

  constructor(private readonly handler: Handler) {}

  async send(request: HttpRequest, options: SendOptions): Promise<HttpResponse> {
    this.sent.push({ request, options });
    return this.handler(request, options);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * Transport replaying a fixed sequence; an Error entry is thrown
 */
export function sequenceTransport(responses: Array<HttpResponse | Error>): FakeTransport {
  let index = 0;
  return new FakeTransport(() => {
    const next = responses[Math.min(index, responses.length - 1)];
    index++;
    if (next === undefined) {
      throw new Error('no scripted response');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  });
}

export function recordingSleep() {
  const delays: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    delays.push(ms);
  };
  return { delays, sleep };
}
