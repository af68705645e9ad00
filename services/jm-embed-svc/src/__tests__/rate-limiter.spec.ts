import { describe, expect, it } from 'vitest';

import type { SleepFn } from '@jobmatch/common';

import { RateLimiter } from '../rate-limiter';

function fakeTime(): { clock: () => number; sleep: SleepFn; waits: number[]; now: () => number } {
  let current = 0;
  const waits: number[] = [];
  return {
    clock: () => current,
    sleep: async (ms) => {
      waits.push(ms);
      current += ms;
    },
    waits,
    now: () => current
  };
}

describe('RateLimiter', () => {
  it('spaces three calls at 2 per second across one second', async () => {
    const time = fakeTime();
    const limiter = RateLimiter.perMinute(120, { clock: time.clock, sleep: time.sleep });

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    expect(limiter.intervalMs).toBe(500);
    expect(time.waits).toEqual([500, 500]);
    expect(time.now()).toBe(1000);
  });

  it('does not delay the first call', async () => {
    const time = fakeTime();
    const limiter = new RateLimiter(1000, { clock: time.clock, sleep: time.sleep });

    await expect(limiter.acquire()).resolves.toBe(0);
    expect(time.waits).toEqual([]);
  });

  it('reserves distinct slots for concurrent callers', async () => {
    const waits: number[] = [];
    const limiter = new RateLimiter(500, {
      clock: () => 0,
      sleep: async (ms) => {
        waits.push(ms);
      }
    });

    const results = await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()]);

    expect(results).toEqual([0, 500, 1000]);
    expect(waits).toEqual([500, 1000]);
  });

  it('skips the wait once the interval has already elapsed', async () => {
    let current = 0;
    const waits: number[] = [];
    const limiter = new RateLimiter(500, {
      clock: () => current,
      sleep: async (ms) => {
        waits.push(ms);
      }
    });

    await limiter.acquire();
    current = 800;
    await expect(limiter.acquire()).resolves.toBe(0);
    expect(waits).toEqual([]);
  });

  it('rejects with cancelled when the signal is already aborted', async () => {
    const limiter = new RateLimiter(500);
    const controller = new AbortController();
    controller.abort();

    await expect(limiter.acquire(controller.signal)).rejects.toMatchObject({ code: 'cancelled' });
  });

  it('cancels a pending wait on the real clock', async () => {
    const limiter = new RateLimiter(60_000);
    const controller = new AbortController();

    await limiter.acquire(controller.signal);
    const pending = limiter.acquire(controller.signal);
    controller.abort();

    await expect(pending).rejects.toMatchObject({ code: 'cancelled' });
  });

  it('holds real callers to the configured rate', async () => {
    const limiter = RateLimiter.perMinute(120);
    const startedAt = Date.now();

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(990);
  });

  it('rejects a non-positive request rate', () => {
    expect(() => RateLimiter.perMinute(0)).toThrow(expect.objectContaining({ code: 'invalid_input' }));
  });
});
