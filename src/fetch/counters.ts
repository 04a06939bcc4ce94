/**
 * Run-scoped fetch counters. The engine writes, reporting reads snapshots.
 */

export const COUNTER_NAMES = [
  'requests',
  'successes',
  'rateLimited',
  'retries',
  'recordsFound',
  'networkFailures',
  'parseFailures',
  'shapeUnrecognized',
  'sectorsExhausted',
] as const;

export type CounterName = typeof COUNTER_NAMES[number];

export type CounterSnapshot = Readonly<Record<CounterName, number>>;

export class RunCounters {
  private readonly values: Record<CounterName, number> = {
    requests: 0,
    successes: 0,
    rateLimited: 0,
    retries: 0,
    recordsFound: 0,
    networkFailures: 0,
    parseFailures: 0,
    shapeUnrecognized: 0,
    sectorsExhausted: 0,
  };

  increment(name: CounterName, by: number = 1): void {
    this.values[name] += by;
  }

  get(name: CounterName): number {
    return this.values[name];
  }

  snapshot(): CounterSnapshot {
    return Object.freeze({ ...this.values });
  }
}
