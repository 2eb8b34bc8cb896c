import { setTimeout as sleep } from 'node:timers/promises';

export type RetryPolicy = Readonly<{
  /** Total attempts, the first one included. */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}>;

export class RetryBudgetExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    override readonly cause: unknown
  ) {
    super(
      `Gave up after ${attempts} attempt(s): ${cause instanceof Error ? cause.message : String(cause)}`
    );
    this.name = 'RetryBudgetExhaustedError';
  }
}

/** Delay before retry number `retry` (1-based). */
export const backoffDelay = (policy: RetryPolicy, retry: number): number =>
  Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (retry - 1));

/**
 * Run `task` until it succeeds, `isRetryable` says no, or the attempts run
 * out. Aborting `signal` during a backoff rejects with the AbortError.
 */
export async function retryWithBackoff<T>(
  task: () => Promise<T>,
  options: Readonly<{
    policy: RetryPolicy;
    signal: AbortSignal;
    isRetryable: (error: unknown) => boolean;
    onRetry?: (error: unknown, retry: number, delayMs: number) => void;
  }>
): Promise<T> {
  const { policy, signal, isRetryable, onRetry } = options;
  const attempts = Math.max(1, policy.attempts);
  for (let attempt = 1; ; attempt++) {
    try {
      return await task();
    } catch (error) {
      if (!isRetryable(error)) throw error;
      if (attempt >= attempts) {
        throw new RetryBudgetExhaustedError(attempt, error);
      }
      const delayMs = backoffDelay(policy, attempt);
      onRetry?.(error, attempt, delayMs);
      await sleep(delayMs, undefined, { signal });
    }
  }
}
