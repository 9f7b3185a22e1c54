/**
 * Shared utility functions used across FlowPulse packages.
 */

import { nanoid } from 'nanoid';

/** Generate a short unique ID (used to correlate log lines of one cycle) */
export function generateId(): string {
  return nanoid(10);
}

/**
 * Sleep for a given number of milliseconds.
 * Resolves early, without rejecting, when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });

    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
  });
}
