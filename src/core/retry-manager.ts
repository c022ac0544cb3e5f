/**
 * RetryManager - Retries callback deliveries with exponential backoff and jitter
 *
 * Only webhook callback delivery retries; round-trip sends never do (the
 * caller decides). Delays follow capped exponential backoff with full
 * jitter: random(0, min(maxDelay, initialDelay * 2^attempt)).
 */

import { errorMessage } from '../errors';

export interface RetryOptions {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  /** Return false to stop retrying after this error */
  shouldRetry?: (error: unknown) => boolean;
  /** Aborting stops further attempts and cuts the current delay short */
  signal?: AbortSignal;
  /** Prefix for log lines */
  label?: string;
}

export interface RetryResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  attempts: number;
  totalTimeMs: number;
}

/**
 * Retries a function with exponential backoff and full jitter
 *
 * @param fn - The async function to retry; receives the 0-based attempt number
 * @returns Result with success status, data/error, and metadata
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const startTime = Date.now();
  const label = options.label ?? 'RETRY';
  let lastError = 'Unknown error';
  let attempts = 0;

  for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
    if (options.signal?.aborted) {
      lastError = 'aborted';
      break;
    }

    attempts = attempt + 1;
    try {
      const result = await fn(attempt);

      return {
        success: true,
        data: result,
        attempts,
        totalTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      lastError = errorMessage(error);
      console.log(`[${label}] Attempt ${attempts}/${options.maxRetries + 1} failed: ${lastError}`);

      if (attempt === options.maxRetries) {
        break;
      }
      if (options.shouldRetry && !options.shouldRetry(error)) {
        break;
      }

      const delay = calculateDelayWithJitter(attempt, options.initialDelayMs, options.maxDelayMs);
      console.log(`[${label}] Waiting ${delay}ms before attempt ${attempts + 1}...`);
      await sleep(delay, options.signal);
    }
  }

  return {
    success: false,
    error: lastError,
    attempts,
    totalTimeMs: Date.now() - startTime,
  };
}

/**
 * Capped exponential backoff with full jitter
 *
 * Example with initialDelay=100ms, maxDelay=2s:
 * - Attempt 0: 0-100ms
 * - Attempt 1: 0-200ms
 * - Attempt 4: 0-1600ms
 * - Attempt 5: 0-2000ms (capped)
 */
export function calculateDelayWithJitter(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number
): number {
  const exponentialDelay = initialDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);

  return Math.floor(Math.random() * cappedDelay);
}

/**
 * Resolves after ms, or as soon as the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Settles with the work, or with undefined as soon as the signal aborts
 *
 * The work keeps running after an abort; its outcome is dropped.
 */
export function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T | undefined> {
  if (signal.aborted) {
    return Promise.resolve(undefined);
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => resolve(undefined);
    signal.addEventListener('abort', onAbort, { once: true });

    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
