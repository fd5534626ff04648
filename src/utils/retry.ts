import { LogLevel, describeError, log } from "./logger";

export interface RetryOptions {
  maxAttempts?: number; // total attempts including the first
  baseDelayMs?: number; // starting delay
  maxDelayMs?: number; // upper bound on delay
  label?: string; // shown in the retry log line
  shouldRetry?: (err: unknown) => boolean;
}

/**
 * Executes an async function with exponential backoff and a small random jitter.
 * Used for startup probes only; request-path calls get a single attempt.
 * @param fn The asynchronous call to execute
 * @param options Attempt count, delay bounds and an optional retry predicate
 * @returns The resolved value of `fn`
 * @throws The last error once attempts are exhausted or `shouldRetry` declines
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    baseDelayMs = 500,
    maxDelayMs = 10_000,
    label = "operation",
    shouldRetry = () => true
  } = options;

  let attempt = 1;
  const jitter = () => Math.random() * 100;

  // eslint-disable-next-line no-constant-condition
  while (true) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= maxAttempts || !shouldRetry(err)) {
        throw err;
      }

      const delay =
        Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs) + jitter();

      log(
        LogLevel.WARN,
        `${label} failed on attempt ${attempt}/${maxAttempts}, retrying in ${Math.round(
          delay
        )}ms: ${describeError(err)}`
      );

      await new Promise((resolve) => setTimeout(resolve, delay));
      attempt += 1;
    }
  }
}
