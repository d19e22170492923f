import type { SleepFn } from './types.js';

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BASE_DELAY_MS = 200;

/**
 * Exponential backoff with a little jitter: base, 2*base, 4*base, ...
 */
export function backoffDelayMs(attempt: number, baseDelayMs = DEFAULT_BASE_DELAY_MS): number {
  const factor = 2 ** Math.max(0, attempt - 1);
  const jitter = Math.floor(Math.random() * 50);
  return baseDelayMs * factor + jitter;
}

export const defaultSleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));
