import { delay, invalidInputError, systemClock, throwIfAborted, type Clock, type SleepFn } from '@jobmatch/common';

export interface RateLimiterOptions {
  clock?: Clock;
  sleep?: SleepFn;
}

/**
 * Spaces calls at least `intervalMs` apart. Each caller reserves its slot
 * synchronously before suspending, so concurrent callers never share an interval.
 */
export class RateLimiter {
  private lastCallAt = Number.NEGATIVE_INFINITY;
  private readonly clock: Clock;
  private readonly sleep: SleepFn;

  constructor(readonly intervalMs: number, options: RateLimiterOptions = {}) {
    if (!Number.isFinite(intervalMs) || intervalMs < 0) {
      throw invalidInputError('Rate limiter interval must be a non-negative number of milliseconds.', { intervalMs });
    }
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? delay;
  }

  static perMinute(requestsPerMinute: number, options: RateLimiterOptions = {}): RateLimiter {
    if (!Number.isFinite(requestsPerMinute) || requestsPerMinute <= 0) {
      throw invalidInputError('requestsPerMinute must be positive.', { requestsPerMinute });
    }
    return new RateLimiter(60_000 / requestsPerMinute, options);
  }

  /** Resolves once the caller's slot arrives. Returns the time spent waiting. */
  async acquire(signal?: AbortSignal): Promise<number> {
    throwIfAborted(signal);

    const now = this.clock();
    const slot = Math.max(now, this.lastCallAt + this.intervalMs);
    this.lastCallAt = slot;

    const waitMs = slot - now;
    if (waitMs > 0) {
      await this.sleep(waitMs, signal);
    }
    return waitMs;
  }
}
