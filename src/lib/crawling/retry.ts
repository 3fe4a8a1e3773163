/**
 * Retry utility with exponential backoff
 */

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Retry `fn` while `isRetryable(error)` holds, doubling the delay each attempt.
 * `maxRetries` counts retries, so `fn` runs at most `maxRetries + 1` times.
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: {
    maxRetries: number;
    baseDelay: number;
    isRetryable: (error: unknown) => boolean;
    onRetry?: (error: unknown, attempt: number, delay: number) => void;
  }
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= options.maxRetries || !options.isRetryable(error)) {
        throw error;
      }

      const delay = options.baseDelay * Math.pow(2, attempt);
      options.onRetry?.(error, attempt + 1, delay);
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }
}
