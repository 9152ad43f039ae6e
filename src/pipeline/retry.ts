/**
 * Retry logic with exponential backoff
 */

import { NetworkError, RateLimitError, ServerError, TimeoutError, UpstreamError } from './errors';

export interface RetryConfig {
  /** Maximum number of retry attempts */
  maxRetries: number;
  /** Initial delay between retries in milliseconds */
  initialDelay: number;
  /** Maximum delay between retries in milliseconds */
  maxDelay: number;
  /** Exponential backoff base */
  exponentialBase: number;
  /** Add random jitter to delays */
  jitter: boolean;
  /** HTTP status codes that should trigger retry */
  retryableStatusCodes: Set<number>;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  exponentialBase: 2,
  jitter: true,
  retryableStatusCodes: new Set([408, 429, 500, 502, 503, 504]),
};

function calculateDelay(attempt: number, config: RetryConfig): number {
  let delay = Math.min(
    config.initialDelay * Math.pow(config.exponentialBase, attempt),
    config.maxDelay
  );

  if (config.jitter) {
    // Equal jitter: between 50% and 100% of the computed delay
    delay = delay * (0.5 + Math.random() * 0.5);
  }

  return delay;
}

function statusOf(error: unknown): number | undefined {
  if (error instanceof UpstreamError) return error.statusCode;
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const status = Number(error.status);
    return Number.isFinite(status) ? status : undefined;
  }
  return undefined;
}

export function shouldRetry(attempt: number, error: unknown, config: RetryConfig): boolean {
  if (attempt >= config.maxRetries) {
    return false;
  }

  if (error instanceof NetworkError || error instanceof TimeoutError) {
    return true;
  }

  if (error instanceof RateLimitError || error instanceof ServerError) {
    return true;
  }

  const status = statusOf(error);
  return status !== undefined && config.retryableStatusCodes.has(status);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute function with retry logic
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!shouldRetry(attempt, error, config)) {
        throw error;
      }

      let delay = calculateDelay(attempt, config);

      // For rate limit errors, honour Retry-After when present
      if (error instanceof RateLimitError && error.retryAfter) {
        delay = Math.max(delay, error.retryAfter * 1000);
      }

      await sleep(delay);
    }
  }

  throw lastError;
}
