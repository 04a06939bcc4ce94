/**
 * Run profiles: concurrency, pacing and batching presets
 */

import type { ModeOption, ProfileName, RunProfile } from '../types.js';

export const PROFILES: Readonly<Record<ProfileName, RunProfile>> = {
  fast: {
    name: 'fast',
    maxConcurrent: 90,
    delayRangeMs: [50, 150],
    poolSize: 150,
    perHostConnections: 50,
    batchSize: 50,
    gcEvery: 20,
    description: 'FAST mode - requires a large proxy pool',
  },
  medium: {
    name: 'medium',
    maxConcurrent: 10,
    delayRangeMs: [1000, 3000],
    poolSize: 50,
    perHostConnections: 50,
    batchSize: 20,
    gcEvery: 10,
    description: 'MEDIUM mode - limited proxies',
  },
  slow: {
    name: 'slow',
    maxConcurrent: 3,
    delayRangeMs: [2000, 5000],
    poolSize: 20,
    perHostConnections: 20,
    batchSize: 10,
    gcEvery: 5,
    description: 'SLOW mode - few or no proxies, long delays',
  },
};

export function selectProfile(proxyCount: number): RunProfile {
  if (proxyCount >= 50) {
    return PROFILES.fast;
  }
  if (proxyCount >= 5) {
    return PROFILES.medium;
  }
  return PROFILES.slow;
}

export function resolveProfile(mode: ModeOption, proxyCount: number): RunProfile {
  return mode === 'auto' ? selectProfile(proxyCount) : PROFILES[mode];
}
