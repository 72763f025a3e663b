import { sleep as defaultSleep, type Sleep } from './concurrency';

export interface RetryPolicy {
  maxAttempts: number;
  /** Delay after failed attempt `attempt` (1-based). */
  delayMs(attempt: number): number;
}

/** Rendered-page retry schedule. */
export const RENDER_RETRY_DELAYS_MS = [1000, 3000, 7000] as const;

/**
 * One attempt per entry in `delays`; the delay at index i follows failed attempt i + 1.
 */
export function fixedDelayPolicy(delays: readonly number[]): RetryPolicy {
  return {
    maxAttempts: delays.length,
    delayMs: (attempt) => delays[Math.min(attempt, delays.length) - 1] ?? 0,
  };
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

export interface RetryOptions {
  sleep?: Sleep;
  onFailure?: (attempt: number, error: unknown, delayMs: number) => void;
}

/**
 * Runs `fn` until it resolves or the policy's attempts are used up.
 * Every failed attempt, the last one included, is followed by its delay.
 */
export async function retryWithPolicy<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<RetryOutcome<T>> {
  const wait = options.sleep ?? defaultSleep;
  let lastError: unknown = new Error('No attempts made');

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      const value = await fn(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (err) {
      lastError = err;
      const delay = policy.delayMs(attempt);
      options.onFailure?.(attempt, err, delay);
      if (delay > 0) await wait(delay);
    }
  }

  return { ok: false, error: lastError, attempts: policy.maxAttempts };
}
