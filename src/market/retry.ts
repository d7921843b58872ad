/**
 * Retry helpers for broker HTTP calls: linear back-off on rate limits,
 * exponential back-off with jitter on transient network and 5xx failures.
 */

import { isAxiosError } from "axios";

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** 0-1 */
  jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = {
  maxRetries: 3,
  baseDelayMs: 2000,
  maxDelayMs: 30000,
  jitterFactor: 0.3,
};

const RETRYABLE_ERROR_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "ECONNREFUSED",
  "ENOTFOUND",
  "EAI_AGAIN",
]);

const RETRYABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);

export function statusOf(error: unknown): number | undefined {
  return isAxiosError(error) ? error.response?.status : undefined;
}

export function isRateLimitError(error: unknown): boolean {
  return statusOf(error) === 429;
}

export function isRetryableError(error: unknown): boolean {
  const status = statusOf(error);
  if (status !== undefined) return RETRYABLE_STATUS_CODES.has(status);
  if (isAxiosError(error) && error.code && RETRYABLE_ERROR_CODES.has(error.code)) return true;
  return false;
}

export function calculateBackoff(
  attempt: number,
  rateLimited: boolean,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  random: () => number = Math.random,
): number {
  const { baseDelayMs, maxDelayMs, jitterFactor } = config;
  if (rateLimited) {
    // books reset their windows on a fixed cadence; wait a little longer each time
    return Math.min(baseDelayMs * (attempt + 1), maxDelayMs);
  }
  const exponential = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
  return Math.round(exponential + exponential * jitterFactor * random());
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `fn`, retrying failures `shouldRetry` accepts. The last error is
 * rethrown once attempts are exhausted or a failure is not retryable.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig> = {},
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void,
  wait: (ms: number) => Promise<void> = sleep,
  shouldRetry: (error: unknown) => boolean = isRetryableError,
): Promise<T> {
  const full = { ...DEFAULT_RETRY_CONFIG, ...config };
  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      if (!shouldRetry(err) || attempt >= full.maxRetries) throw err;
      const delayMs = calculateBackoff(attempt, isRateLimitError(err), full);
      onRetry?.(attempt + 1, err, delayMs);
      await wait(delayMs);
    }
  }
}
