import { describe, it, expect, vi } from 'vitest';
import { withRetry, sleep, isRetryable } from './retry';
import { AbortError, ApiError } from './errors';

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const operation = vi.fn().mockResolvedValue('ok');

    await expect(withRetry(operation, { baseDelayMs: 0 })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('retries transient failures until the operation succeeds', async () => {
    const operation = vi.fn()
      .mockRejectedValueOnce(new ApiError('too_many_requests', 'dropbox', 429, true))
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValue('page');
    const onRetry = vi.fn();

    await expect(withRetry(operation, { baseDelayMs: 1, onRetry })).resolves.toBe('page');
    expect(operation).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls.map(call => call[2])).toEqual([1, 2]);
  });

  it('gives up after maxAttempts with a definitive error', async () => {
    const operation = vi.fn().mockRejectedValue(new ApiError('internal_error', 'dropbox', 500, true));

    const failure = withRetry(operation, { maxAttempts: 3, baseDelayMs: 0 });

    await expect(failure).rejects.toThrow('Operation failed after 3 attempts: internal_error');
    await expect(failure).rejects.toMatchObject({ provider: 'dropbox', status: 500, retryable: false });
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('does not retry non-retryable errors', async () => {
    const error = new ApiError('invalid_access_token', 'dropbox', 401, false);
    const operation = vi.fn().mockRejectedValue(error);

    await expect(withRetry(operation, { baseDelayMs: 0 })).rejects.toBe(error);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('stops waiting when the signal aborts during backoff', async () => {
    const controller = new AbortController();
    const operation = vi.fn().mockRejectedValue(new Error('timeout'));
    const reason = new AbortError('stop');

    const pending = withRetry(operation, {
      baseDelayMs: 60_000,
      signal: controller.signal,
      onRetry: () => controller.abort(reason),
    });

    await expect(pending).rejects.toBe(reason);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn().mockResolvedValue('never');

    await expect(withRetry(operation, { signal: controller.signal })).rejects.toMatchObject({ name: 'AbortError' });
    expect(operation).not.toHaveBeenCalled();
  });
});

describe('sleep', () => {
  it('resolves after the delay', async () => {
    await expect(sleep(1)).resolves.toBeUndefined();
  });
});

describe('isRetryable', () => {
  it('honours the ApiError flag and never retries aborts', () => {
    expect(isRetryable(new ApiError('x', 'dropbox', 503, true))).toBe(true);
    expect(isRetryable(new ApiError('x', 'dropbox', 409, false))).toBe(false);
    expect(isRetryable(new AbortError())).toBe(false);
    expect(isRetryable(new Error('ECONNRESET'))).toBe(true);
  });
});
