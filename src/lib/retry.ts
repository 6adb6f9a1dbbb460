import { EmptyResponseError, ServiceUnavailableError } from './errors.js';

/**
 * Failures worth another attempt: an empty model reply, or a request that
 * timed out while the model was still loading. A refused connection is not
 * retried; the service has to be started first.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof EmptyResponseError) return true;
  if (error instanceof ServiceUnavailableError) return error.timedOut;
  return false;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: {
    maxAttempts?: number;
    baseDelay?: number;
    shouldRetry?: (error: unknown) => boolean;
    onRetry?: (attempt: number, error: Error) => void;
  },
): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? 3;
  const baseDelay = options?.baseDelay ?? 1000;
  const shouldRetry = options?.shouldRetry ?? isRetryable;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt >= maxAttempts || !shouldRetry(err)) {
        throw lastError;
      }

      options?.onRetry?.(attempt, lastError);

      const delay = baseDelay * Math.pow(2, attempt - 1) * (0.5 + Math.random());
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError ?? new Error('withRetry: no attempts were made');
}
