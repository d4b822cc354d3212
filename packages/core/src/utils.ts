/**
 * Utility functions for the report core
 */

/**
 * Options for {@link withRetry}
 */
export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  /** Called before each retry with the failed attempt number (0-based) */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Retry a function with exponential backoff
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxRetries = 3,
    baseDelayMs = 1000,
    maxDelayMs = 30000,
    shouldRetry = () => true,
    onRetry,
  } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt === maxRetries || !shouldRetry(error)) {
        throw error;
      }

      const delay = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
      onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }

  throw lastError;
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Options for {@link withTimeout}
 */
export interface TimeoutOptions {
  timeoutMs: number;
  /** Caller cancellation; an already-aborted signal rejects immediately */
  signal?: AbortSignal | undefined;
  /** Builds the rejection for a timeout or an abort */
  onTimeout: (reason: 'timeout' | 'aborted') => Error;
}

/**
 * Race a promise against a deadline and an optional abort signal
 *
 * The timer and the abort listener are always released, so a settled call
 * leaves nothing scheduled.
 */
export function withTimeout<T>(work: () => Promise<T>, options: TimeoutOptions): Promise<T> {
  const { timeoutMs, signal, onTimeout } = options;

  if (signal?.aborted) {
    return Promise.reject(onTimeout('aborted'));
  }

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      cleanup();
      reject(onTimeout('timeout'));
    }, timeoutMs);

    const onAbort = (): void => {
      cleanup();
      reject(onTimeout('aborted'));
    };

    function cleanup(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }

    signal?.addEventListener('abort', onAbort, { once: true });

    work().then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
}

/**
 * Check if a value is defined (not null or undefined)
 */
export function isDefined<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}
