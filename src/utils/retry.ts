/**
 * Polling helpers
 */

export interface PollOptions {
  intervalMs: number;
  maxAttempts: number;
}

/**
 * Sleep for a duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Call fn until it returns a non-null value
 *
 * Returns null when every attempt came back empty. Errors thrown by fn are
 * not retried.
 */
export async function pollUntil<T>(
  fn: (attempt: number) => Promise<T | null>,
  options: PollOptions
): Promise<T | null> {
  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    const result = await fn(attempt);
    if (result !== null) {
      return result;
    }
    if (attempt < options.maxAttempts) {
      await sleep(options.intervalMs);
    }
  }
  return null;
}
