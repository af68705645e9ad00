import { setTimeout as wait } from 'node:timers/promises';

import { cancelledError } from './errors';

export type Clock = () => number;

/**
 * Suspends the caller for `ms` milliseconds. Implementations must reject with a
 * `cancelled` ServiceError once `signal` aborts.
 */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export const systemClock: Clock = () => Date.now();

export function throwIfAborted(signal: AbortSignal | undefined, details?: Record<string, unknown>): void {
  if (signal?.aborted) {
    throw cancelledError('Operation cancelled.', details, signal.reason);
  }
}

export const delay: SleepFn = async (ms, signal) => {
  throwIfAborted(signal);
  if (ms <= 0) {
    return;
  }

  try {
    await wait(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw cancelledError('Operation cancelled while waiting.', { waitMs: ms }, error);
    }
    throw error;
  }
};
