/**
 * Deadline-bounded polling
 * The host has no push notifications, so every wait re-fetches until a predicate holds.
 */

import { systemClock, type Clock } from './clock.js';

export const POLL_INTERVAL_MS = 100;

export interface PollOptions<T> {
  fetch: () => Promise<T>;
  check: (value: T) => boolean;
  timeoutMs: number;
  /** Builds the error thrown once the deadline passes, from the last fetched value. */
  onTimeout: (last: T) => Error;
  intervalMs?: number;
  clock?: Clock;
  signal?: AbortSignal;
}

/**
 * Fetch, evaluate, and retry until `check` passes or the deadline expires.
 * Fetch failures propagate immediately; only "not yet true" is retried.
 */
export async function pollUntil<T>(options: PollOptions<T>): Promise<T> {
  const clock = options.clock ?? systemClock;
  const intervalMs = options.intervalMs ?? POLL_INTERVAL_MS;
  const deadline = clock.now() + options.timeoutMs;

  for (;;) {
    const value = await options.fetch();
    if (options.check(value)) return value;

    if (clock.now() >= deadline) {
      throw options.onTimeout(value);
    }

    await clock.sleep(intervalMs, options.signal);
  }
}
