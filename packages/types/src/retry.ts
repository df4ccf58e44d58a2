/**
 * Backoff for transport failures.
 *
 * Fetchers wrap single requests in {@link withRetry}. Verification failures
 * never pass through here: a document that fails a trust check is final.
 *
 * @packageDocumentation
 */

export interface RetryOptions {
  /** Retries after the first attempt. Defaults to 3. */
  maxRetries?: number;
  /** Wait before the first retry, doubled for each one after. Defaults to 100. */
  baseDelayMs?: number;
  /** Cap on a single wait. Defaults to 5000. */
  maxDelayMs?: number;
  /** Return false to fail at once on this error. */
  retryOn?: (error: Error) => boolean;
  /** Called with the 1-based retry number before each wait. */
  onRetry?: (attempt: number, error: Error) => void;
}

/**
 * Run `fn`, retrying rejected attempts with doubling delays.
 *
 * ```ts
 * const bytes = await withRetry(() => download(url), {
 *   maxRetries: 2,
 *   retryOn: (e) => !(e instanceof FetchError && e.notFound),
 * });
 * ```
 *
 * @throws The error of the last attempt. Non-`Error` rejections are wrapped.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxRetries = 3, baseDelayMs = 100, maxDelayMs = 5000, retryOn, onRetry } = options;

  let attempt = 0;
  for (;;) {
    try {
      return await fn();
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught));
      if (attempt >= maxRetries || (retryOn !== undefined && !retryOn(error))) {
        throw error;
      }
      attempt += 1;
      onRetry?.(attempt, error);
      await delay(Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs));
    }
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
