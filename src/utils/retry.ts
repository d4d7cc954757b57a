/**
 * Retry Utility
 * Exponential backoff for idempotent upstream reads
 */

export interface BackoffOptions {
  /** Maximum number of attempts (default: 3) */
  maxAttempts?: number;
  /** Initial delay in ms (default: 500) */
  initialDelay?: number;
  /** Maximum delay in ms (default: 5000) */
  maxDelay?: number;
  /** Backoff multiplier (default: 2) */
  multiplier?: number;
  /** Called before each retry */
  onRetry?: (error: Error, attempt: number, nextDelay: number) => void;
  /** Decides whether an error is worth another attempt */
  shouldRetry?: (error: Error) => boolean;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retry a function with exponential backoff.
 *
 * The last error is rethrown unchanged once attempts run out or
 * `shouldRetry` declines, so callers see the original failure type.
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: BackoffOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    initialDelay = 500,
    maxDelay = 5000,
    multiplier = 2,
    onRetry,
    shouldRetry,
  } = options;

  let delay = initialDelay;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));

      if (attempt >= maxAttempts || (shouldRetry && !shouldRetry(err))) {
        throw err;
      }

      const nextDelay = Math.min(delay, maxDelay);
      onRetry?.(err, attempt, nextDelay);
      await sleep(nextDelay);
      delay *= multiplier;
    }
  }
}
