/**
 * Exponential backoff utility for per-sector retries
 */

import { logger, describeError } from './logger.js';

export type SleepFn = (ms: number) => Promise<void>;

export interface BackoffOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  sleep?: SleepFn;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export class BackoffError extends Error {
  constructor(message: string, public attempts: number, public lastError: unknown) {
    super(message);
    this.name = 'BackoffError';
  }
}

/**
 * Delay after failed attempt `attempt` (0-based): base * 2^attempt
 */
export function backoffDelayMs(attempt: number, baseDelayMs: number = 1000): number {
  return baseDelayMs * Math.pow(2, attempt);
}

/**
 * Execute a function with exponential backoff retry logic.
 *
 * Every failed attempt is followed by its backoff delay, the last one
 * included, so a sector that exhausts its attempts holds its slot for the
 * full cool-down before giving up.
 */
export async function withBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: BackoffOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    baseDelayMs = 1000,
    sleep: sleepFn = sleep,
    isRetryable = () => true,
    onRetry,
  } = options;

  let lastError: unknown = undefined;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (!isRetryable(error)) {
        throw new BackoffError(
          `Non-retryable failure on attempt ${attempt + 1}: ${describeError(error)}`,
          attempt + 1,
          error
        );
      }

      const delay = backoffDelayMs(attempt, baseDelayMs);
      logger.debug(`Attempt ${attempt + 1} failed, backing off ${delay}ms`, {
        error: describeError(error),
        attempt: attempt + 1,
        maxAttempts,
      });
      onRetry?.(error, attempt, delay);

      await sleepFn(delay);
    }
  }

  throw new BackoffError(
    `Failed after ${maxAttempts} attempts: ${describeError(lastError)}`,
    maxAttempts,
    lastError
  );
}

/**
 * Sleep for the specified number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Uniform draw from [min, max]
 */
export function uniformBetween(min: number, max: number, random: () => number = Math.random): number {
  return min + (max - min) * random();
}
