import { describe, it, expect } from 'vitest';
import { PROFILES, resolveProfile, selectProfile } from '../../src/fetch/profiles.js';
import { RunCounters, COUNTER_NAMES } from '../../src/fetch/counters.js';

describe('Run profiles', () => {
  it('should pick the profile from the proxy count', () => {
    expect(selectProfile(0).name).toBe('slow');
    expect(selectProfile(4).name).toBe('slow');
    expect(selectProfile(5).name).toBe('medium');
    expect(selectProfile(49).name).toBe('medium');
    expect(selectProfile(50).name).toBe('fast');
  });

  it('should let an explicit mode override the proxy count', () => {
    expect(resolveProfile('fast', 0)).toBe(PROFILES.fast);
    expect(resolveProfile('auto', 10)).toBe(PROFILES.medium);
  });

  it('should scale pacing down as concurrency goes up', () => {
    expect(PROFILES.fast.maxConcurrent).toBeGreaterThan(PROFILES.medium.maxConcurrent);
    expect(PROFILES.medium.maxConcurrent).toBeGreaterThan(PROFILES.slow.maxConcurrent);
    expect(PROFILES.fast.delayRangeMs).toEqual([50, 150]);
    expect(PROFILES.slow.delayRangeMs).toEqual([2000, 5000]);
  });
});

describe('RunCounters', () => {
  it('should start at zero and count', () => {
    const counters = new RunCounters();
    counters.increment('requests');
    counters.increment('recordsFound', 7);

    const snapshot = counters.snapshot();
    expect(Object.keys(snapshot)).toEqual([...COUNTER_NAMES]);
    expect(snapshot.requests).toBe(1);
    expect(snapshot.recordsFound).toBe(7);
    expect(snapshot.retries).toBe(0);
  });

  it('should hand out frozen snapshots', () => {
    const counters = new RunCounters();
    const before = counters.snapshot();
    counters.increment('successes');

    expect(before.successes).toBe(0);
    expect(counters.get('successes')).toBe(1);
    expect(Object.isFrozen(before)).toBe(true);
  });
});
