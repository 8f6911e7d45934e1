/**
 * Throttle backoff: the single place a timeline walk sleeps
 * - Honors a numeric retry-after header (seconds)
 * - Otherwise waits a fixed default (60s)
 */

import { getLogger } from './logger.js';

export const DEFAULT_BACKOFF_SECONDS = 60;

export type SleepFn = (ms: number) => Promise<void>;

export interface BackoffOptions {
  defaultSeconds?: number; // default 60
  sleep?: SleepFn;
}

export type HeaderSource = Pick<Headers, 'get'>;

/**
 * Sleep for a given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Seconds requested by a retry-after header, or null when absent or not a
 * non-negative integer (HTTP-date values fall through to the default)
 */
export function parseRetryAfter(headers: HeaderSource): number | null {
  const raw = headers.get('retry-after');
  if (raw === null) {
    return null;
  }
  const trimmed = raw.trim();
  if (!/^\+?\d+$/.test(trimmed)) {
    return null;
  }
  return parseInt(trimmed, 10);
}

/**
 * Sleep for the throttle delay and return the milliseconds waited. Never throws
 * on a malformed header.
 */
export async function backoff(headers: HeaderSource, options?: BackoffOptions): Promise<number> {
  const defaultSeconds = options?.defaultSeconds ?? DEFAULT_BACKOFF_SECONDS;
  const sleepFn = options?.sleep ?? sleep;

  const requested = parseRetryAfter(headers);
  const seconds = requested ?? defaultSeconds;
  const delayMs = seconds * 1000;

  getLogger().debug(
    requested === null
      ? `No usable retry-after header; waiting default ${seconds}s`
      : `Honoring retry-after: waiting ${seconds}s`
  );

  await sleepFn(delayMs);
  return delayMs;
}
