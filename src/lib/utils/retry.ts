import type { AppError } from '../errors/base.js';
import type { Logger } from '../logging/logger.js';
import type { Sleep } from './date.js';
import type { Result } from './result.js';

export type RetryPolicy = {
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  maxRetries: number;
};

/** Delay before retry number `attempt` (1-based). */
export const computeBackoffDelay = (policy: RetryPolicy, attempt: number): number =>
  Math.min(policy.maxDelayMs, policy.baseDelayMs * policy.multiplier ** (attempt - 1));

export type RetryOptions<E> = {
  policy: RetryPolicy;
  sleep: Sleep;
  isRetryable: (error: E) => boolean;
  logger?: Logger;
  operation?: string;
};

/**
 * Runs `fn` until it succeeds, fails with a non-retryable error, or the
 * retry budget is spent. The last error is returned as-is.
 */
export async function withRetry<T, E extends AppError>(
  fn: () => Promise<Result<T, E>>,
  options: RetryOptions<E>
): Promise<Result<T, E>> {
  let attempt = 0;

  for (;;) {
    const result = await fn();
    if (result.ok || !options.isRetryable(result.error) || attempt >= options.policy.maxRetries) {
      return result;
    }

    attempt += 1;
    const delayMs = computeBackoffDelay(options.policy, attempt);
    options.logger?.warn('Retrying after transient failure', {
      data: { operation: options.operation, attempt, delayMs, code: result.error.code },
    });
    await options.sleep(delayMs);
  }
}

/**
 * Races `promise` against a timer. The timer is always cleared so nothing
 * is left pending once the call settles.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => T
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((resolve) => {
    timer = setTimeout(() => resolve(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
