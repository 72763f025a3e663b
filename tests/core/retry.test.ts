import { describe, it, expect, vi } from 'vitest';
import { RENDER_RETRY_DELAYS_MS, fixedDelayPolicy, retryWithPolicy } from '@prepscout/core';

describe('fixedDelayPolicy', () => {
  it('allows one attempt per delay and maps attempts to delays', () => {
    const policy = fixedDelayPolicy(RENDER_RETRY_DELAYS_MS);
    expect(policy.maxAttempts).toBe(3);
    expect(policy.delayMs(1)).toBe(1000);
    expect(policy.delayMs(2)).toBe(3000);
    expect(policy.delayMs(3)).toBe(7000);
    expect(policy.delayMs(5)).toBe(7000);
  });
});

describe('retryWithPolicy', () => {
  it('gives up after every attempt fails, sleeping after each one', async () => {
    const delays: number[] = [];
    const fn = vi.fn(async (attempt: number): Promise<string> => {
      throw new Error(`fail ${attempt}`);
    });

    const outcome = await retryWithPolicy(fn, fixedDelayPolicy([1000, 3000, 7000]), {
      sleep: async (ms) => {
        delays.push(ms);
      },
    });

    expect(fn).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1000, 3000, 7000]);
    expect(outcome.ok).toBe(false);
    expect(outcome.attempts).toBe(3);
    if (!outcome.ok) expect(outcome.error).toEqual(new Error('fail 3'));
  });

  it('returns the first success', async () => {
    const delays: number[] = [];
    const failures: number[] = [];
    let calls = 0;

    const outcome = await retryWithPolicy(
      async () => {
        calls++;
        if (calls === 1) throw new Error('transient');
        return 'ok';
      },
      fixedDelayPolicy([1000, 3000, 7000]),
      {
        sleep: async (ms) => {
          delays.push(ms);
        },
        onFailure: (attempt) => failures.push(attempt),
      },
    );

    expect(outcome).toEqual({ ok: true, value: 'ok', attempts: 2 });
    expect(delays).toEqual([1000]);
    expect(failures).toEqual([1]);
  });
});
