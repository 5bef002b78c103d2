/** Return true for transient network errors worth retrying. */
export function isTransientNetworkError(err: unknown): boolean {
  if (err instanceof Error) {
    return /ECONNRESET|ENOTFOUND|ETIMEDOUT|ECONNREFUSED/.test(err.message);
  }
  return false;
}

export function backoffDelay(attempt: number): number {
  return Math.min(1000 * Math.pow(2, attempt - 1), 16_000);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `start` until it succeeds, retrying transient failures with exponential
 * backoff up to `maxRetries` extra attempts. An aborted signal stops retries.
 */
export async function withRetry<T>(
  start: () => Promise<T>,
  options: {
    maxRetries: number;
    isRetryable: (err: unknown) => boolean;
    signal?: AbortSignal;
    wait?: (ms: number) => Promise<void>;
  },
): Promise<T> {
  const wait = options.wait ?? sleep;
  let attempt = 0;
  while (true) {
    try {
      return await start();
    } catch (err: unknown) {
      if (options.signal?.aborted || !options.isRetryable(err) || attempt >= options.maxRetries) {
        throw err;
      }
      attempt++;
      await wait(backoffDelay(attempt));
    }
  }
}
