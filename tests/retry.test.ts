import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_RETRY_CONFIG, shouldRetry, withRetry, type RetryConfig } from '../src/pipeline/retry';
import { InvalidAPIKeyError, NetworkError, ServerError, UpstreamError } from '../src/pipeline/errors';

const fast: RetryConfig = { ...DEFAULT_RETRY_CONFIG, maxRetries: 2, initialDelay: 1, maxDelay: 2, jitter: false };

describe('shouldRetry', () => {
  it('retries transient failures', () => {
    expect(shouldRetry(0, new NetworkError('down'), fast)).toBe(true);
    expect(shouldRetry(0, new ServerError('oops', 502), fast)).toBe(true);
    expect(shouldRetry(0, new UpstreamError('timeout', 408), fast)).toBe(true);
    expect(shouldRetry(0, { status: 503 }, fast)).toBe(true);
  });

  it('does not retry client errors', () => {
    expect(shouldRetry(0, new InvalidAPIKeyError('bad', 401), fast)).toBe(false);
    expect(shouldRetry(0, new Error('plain'), fast)).toBe(false);
  });

  it('stops at maxRetries', () => {
    expect(shouldRetry(2, new NetworkError('down'), fast)).toBe(false);
  });
});

describe('withRetry', () => {
  it('returns after a transient failure', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new ServerError('oops', 500))
      .mockResolvedValueOnce('ok');
    await expect(withRetry(fn, fast)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('gives up after maxRetries + 1 attempts', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new NetworkError('down'));
    await expect(withRetry(fn, fast)).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('throws non-retryable errors at once', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new InvalidAPIKeyError('bad', 401));
    await expect(withRetry(fn, fast)).rejects.toBeInstanceOf(InvalidAPIKeyError);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
