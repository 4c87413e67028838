/** Shared constants across all LLM providers */

/** Maximum number of retry attempts for transient errors */
export const DEFAULT_MAX_RETRIES = 3;

/** HTTP status codes that trigger automatic retry with backoff */
export const RETRY_STATUS_CODES: ReadonlyArray<number> = [429, 500, 503];

/** Base delay in ms between retries (doubled each attempt via exponential backoff) */
export const RETRY_DELAY_MS = 1000;

export function isRetryableStatus(status: number | undefined): boolean {
  return status !== undefined && RETRY_STATUS_CODES.includes(status);
}

/**
 * Run `fn` up to `maxRetries` times, backing off exponentially while `shouldRetry`
 * accepts the error. Aborting `signal` stops both the retries and the wait between them.
 */
export async function executeWithRetry<T>(
  fn: () => Promise<T>,
  options: { maxRetries: number; shouldRetry: (error: unknown) => boolean; signal?: AbortSignal }
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt < options.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      const finalAttempt = attempt === options.maxRetries - 1;
      if (finalAttempt || options.signal?.aborted || !options.shouldRetry(error)) {
        throw error;
      }
      await delay(RETRY_DELAY_MS * Math.pow(2, attempt), options.signal);
    }
  }

  throw lastError;
}

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
