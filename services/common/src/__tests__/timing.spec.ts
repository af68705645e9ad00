import { describe, expect, it } from 'vitest';

import { delay, throwIfAborted } from '../timing';

describe('throwIfAborted', () => {
  it('throws a cancelled error carrying the details once aborted', () => {
    const controller = new AbortController();
    expect(() => throwIfAborted(controller.signal, { chunk: 1 })).not.toThrow();

    controller.abort();
    expect(() => throwIfAborted(controller.signal, { chunk: 1 })).toThrow(
      expect.objectContaining({ code: 'cancelled', details: { chunk: 1 } })
    );
  });
});

describe('delay', () => {
  it('rejects with a cancelled error when aborted mid-wait', async () => {
    const controller = new AbortController();
    const pending = delay(60_000, controller.signal);
    controller.abort();

    await expect(pending).rejects.toMatchObject({ code: 'cancelled', details: { waitMs: 60_000 } });
  });

  it('resolves immediately for non-positive durations', async () => {
    await expect(delay(0)).resolves.toBeUndefined();
  });
});
