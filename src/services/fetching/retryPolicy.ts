export interface RetryPolicy {
  maxAttempts: number;
  delayMs: number;
  isRetryable(error: unknown): boolean;
}

export interface RetryHooks {
  onRetry?(attempt: number, error: unknown): void;
  sleep?(ms: number): Promise<void>;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

export const retryAll = (): boolean => true;

export function fixedDelayPolicy(maxAttempts: number, delayMs: number): RetryPolicy {
  return {
    maxAttempts: Math.max(1, Math.floor(maxAttempts)),
    delayMs: Math.max(0, delayMs),
    isRetryable: retryAll,
  };
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Runs `operation` until it succeeds, a non-retryable error is thrown or
 * `maxAttempts` is spent, waiting `delayMs` between attempts. Never throws; the
 * caller decides what an exhausted outcome means.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  hooks?: RetryHooks,
): Promise<RetryOutcome<T>> {
  const sleep = hooks?.sleep ?? defaultSleep;
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      if (attempt >= policy.maxAttempts || !policy.isRetryable(error)) {
        return { ok: false, error, attempts: attempt };
      }
      hooks?.onRetry?.(attempt, error);
      if (policy.delayMs > 0) {
        await sleep(policy.delayMs);
      }
    }
  }
}
