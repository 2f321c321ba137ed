/**
 * retryWithBackoff - Retries an async operation with exponential backoff and full jitter
 *
 * Used at startup to reach the broker: the relay keeps trying to connect and
 * subscribe a few times before giving up and exiting.
 *
 * Delay before retry n (0-based) is random(0, min(initialDelayMs * 2^n, maxDelayMs)).
 * Each attempt is also capped by timeoutMs.
 */

import { errorMessage } from '../errors';

export interface RetryOptions {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
  /** Label used in log lines */
  label?: string;
  random?: () => number;
}

export interface RetryResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  attempts: number;
  totalTimeMs: number;
}

export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions): Promise<RetryResult<T>> {
  const startTime = Date.now();
  const label = options.label ?? 'operation';
  const random = options.random ?? Math.random;
  let lastError = 'Unknown error';

  // Initial attempt + retries
  for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
    try {
      console.log(`[RETRY] ${label}: attempt ${attempt + 1}/${options.maxRetries + 1}`);
      const data = await withTimeout(fn(), options.timeoutMs);

      return {
        success: true,
        data,
        attempts: attempt + 1,
        totalTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      lastError = errorMessage(error);
      console.log(`[RETRY] ${label}: attempt ${attempt + 1} failed: ${lastError}`);

      if (attempt === options.maxRetries) {
        break;
      }

      const delay = calculateDelayWithJitter(attempt, options.initialDelayMs, options.maxDelayMs, random);
      console.log(`[RETRY] ${label}: waiting ${delay}ms before retry ${attempt + 2}...`);
      await sleep(delay);
    }
  }

  const totalTimeMs = Date.now() - startTime;
  console.log(`[RETRY] ${label}: all ${options.maxRetries + 1} attempts failed (total time: ${totalTimeMs}ms)`);

  return {
    success: false,
    error: lastError,
    attempts: options.maxRetries + 1,
    totalTimeMs,
  };
}

/**
 * Capped exponential backoff with full jitter
 *
 * initialDelay=100ms, maxDelay=10s:
 * - attempt 0: 0-100ms
 * - attempt 3: 0-800ms
 * - attempt 10: 0-10000ms (capped)
 */
export function calculateDelayWithJitter(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random
): number {
  const cappedDelay = Math.min(initialDelayMs * Math.pow(2, attempt), maxDelayMs);
  return Math.floor(random() * cappedDelay);
}

/**
 * Rejects if the promise has not settled within timeoutMs
 */
async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new Error(`Operation timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
