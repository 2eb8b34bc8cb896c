import { describe, expect, it } from 'vitest';
import {
  RetryBudgetExhaustedError,
  backoffDelay,
  retryWithBackoff,
} from '../../src/projection/retry';

const policy = { attempts: 4, baseDelayMs: 1, maxDelayMs: 3 };

describe('retryWithBackoff', () => {
  it('doubles the delay up to the cap', () => {
    expect([1, 2, 3, 4].map((retry) => backoffDelay(policy, retry))).toEqual([
      1, 2, 3, 3,
    ]);
  });

  it('returns the first success and reports each retry', async () => {
    const retries: Array<[number, number]> = [];
    let calls = 0;

    const result = await retryWithBackoff(
      async () => {
        calls++;
        if (calls < 3) throw new Error(`attempt ${calls}`);
        return 'ok';
      },
      {
        policy,
        signal: new AbortController().signal,
        isRetryable: () => true,
        onRetry: (_error, retry, delayMs) => retries.push([retry, delayMs]),
      }
    );

    expect(result).toBe('ok');
    expect(retries).toEqual([
      [1, 1],
      [2, 2],
    ]);
  });

  it('gives up after the configured attempts', async () => {
    let calls = 0;
    const failing = retryWithBackoff(
      async () => {
        calls++;
        throw new Error('still down');
      },
      {
        policy,
        signal: new AbortController().signal,
        isRetryable: () => true,
      }
    );

    await expect(failing).rejects.toBeInstanceOf(RetryBudgetExhaustedError);
    await expect(failing).rejects.toMatchObject({ attempts: 4 });
    expect(calls).toBe(4);
  });

  it('does not retry errors marked permanent', async () => {
    let calls = 0;
    const permanent = new Error('schema');

    await expect(
      retryWithBackoff(
        async () => {
          calls++;
          throw permanent;
        },
        {
          policy,
          signal: new AbortController().signal,
          isRetryable: (error) => error !== permanent,
        }
      )
    ).rejects.toBe(permanent);
    expect(calls).toBe(1);
  });

  it('stops waiting when aborted', async () => {
    const controller = new AbortController();

    const pending = retryWithBackoff(
      async () => {
        throw new Error('down');
      },
      {
        policy: { attempts: 5, baseDelayMs: 10_000, maxDelayMs: 10_000 },
        signal: controller.signal,
        isRetryable: () => true,
        onRetry: () => controller.abort(),
      }
    );

    await expect(pending).rejects.toHaveProperty('name', 'AbortError');
  });
});
