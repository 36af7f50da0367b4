/**
 * Retry and timeout helpers shared by the run engine and its collaborators
 */

import { setTimeout as delay } from 'node:timers/promises';
import { DeadlineExceededError } from '../errors';

export interface RetryPolicy {
  maxAttempts: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  backoffMultiplier?: number;
  jitterFactor?: number;
}

export interface RetryOptions {
  isRetryable: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Sleep that rejects when the signal aborts
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    signal?.throwIfAborted();
    return;
  }
  await delay(ms, undefined, { signal });
}

/**
 * Exponential backoff delay for a 0-based attempt number
 */
export function calculateBackoffDelay(
  attempt: number,
  initialBackoffMs: number,
  maxBackoffMs: number,
  multiplier: number = 2
): number {
  const exponentialDelay = initialBackoffMs * Math.pow(multiplier, attempt);
  return Math.min(exponentialDelay, maxBackoffMs);
}

/**
 * Spread the delay by up to +/- jitterFactor of its value
 */
export function addJitter(delayMs: number, jitterFactor: number = 0.1): number {
  const jitter = delayMs * jitterFactor * (Math.random() * 2 - 1);
  return Math.max(0, delayMs + jitter);
}

/**
 * Run operation until it succeeds, fails with a non-retryable error, or
 * maxAttempts is used up. The last error is rethrown.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions
): Promise<T> {
  const wait = options.sleep ?? sleep;

  for (let attempt = 0; ; attempt++) {
    options.signal?.throwIfAborted();
    try {
      return await operation(attempt);
    } catch (error) {
      const lastAttempt = attempt + 1 >= policy.maxAttempts;
      if (lastAttempt || !options.isRetryable(error) || options.signal?.aborted) {
        throw error;
      }

      const backoff = calculateBackoffDelay(
        attempt,
        policy.initialBackoffMs,
        policy.maxBackoffMs,
        policy.backoffMultiplier
      );
      const delayMs = addJitter(backoff, policy.jitterFactor);
      options.onRetry?.(error, attempt + 1, delayMs);
      await wait(delayMs, options.signal);
    }
  }
}

/**
 * Give operation its own abort signal that fires after timeoutMs or when the
 * parent signal aborts. A timeout surfaces as DeadlineExceededError.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  parent?: AbortSignal
): Promise<T> {
  parent?.throwIfAborted();

  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener('abort', onParentAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new DeadlineExceededError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });
  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
  });
  // Whichever of these loses the race must not surface as an unhandled rejection
  deadline.catch(() => undefined);
  aborted.catch(() => undefined);

  try {
    return await Promise.race([operation(controller.signal), deadline, aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
