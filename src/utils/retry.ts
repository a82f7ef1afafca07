import { ApiError, abortReason } from './errors';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number, waitMs: number) => void;
}

export const DEFAULT_RETRY: RetryOptions = {
  maxAttempts: 5,
  baseDelayMs: 2000,
};

/**
 * Run an operation, retrying transient failures with exponential backoff.
 * Errors marked non-retryable and aborts are rethrown immediately.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const { maxAttempts, baseDelayMs, signal, onRetry } = { ...DEFAULT_RETRY, ...options };
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (signal?.aborted) {
      throw abortReason(signal);
    }

    try {
      return await operation();
    } catch (error) {
      lastError = error;

      if (signal?.aborted || !isRetryable(error)) {
        throw error;
      }

      // Don't wait after the last attempt
      if (attempt === maxAttempts) {
        break;
      }

      const waitTime = baseDelayMs * Math.pow(2, attempt - 1);
      onRetry?.(error, attempt, waitTime);
      await sleep(waitTime, signal);
    }
  }

  const provider = lastError instanceof ApiError ? lastError.provider : undefined;
  const status = lastError instanceof ApiError ? lastError.status : undefined;
  throw new ApiError(
    `Operation failed after ${maxAttempts} attempts: ${errorMessage(lastError)}`,
    provider,
    status,
    false
  );
}

export function isRetryable(error: unknown): boolean {
  if (error instanceof ApiError) {
    return error.retryable;
  }
  return !(error instanceof Error && error.name === 'AbortError');
}

/**
 * Sleep for the given milliseconds, waking early with a rejection if the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new Error('aborted'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
