export interface RetryOptions {
  retries?: number;
  delayMs?: number;
  factor?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown) => void;
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Run fn, retrying with exponential backoff while shouldRetry accepts the
 * error. The last error is rethrown once retries are exhausted.
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retries = 3, delayMs = 500, factor = 2, shouldRetry = () => true, onRetry } = options;

  let attempt = 0;
  let delay = delayMs;

  for (;;) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= retries || !shouldRetry(error)) {
        throw error;
      }
      attempt += 1;
      onRetry?.(attempt, error);
      await sleep(delay);
      delay *= factor;
    }
  }
}
