export interface RetryOptions {
  retries: number;
  delayMs: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}

/**
 * Timeouts, aborted requests, fetch network failures and HTTP 429/5xx are
 * worth another attempt. Anything else is a business-logic failure.
 */
export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  if (error.name === 'TimeoutError' || error.name === 'AbortError') {
    return true;
  }

  // undici reports connection failures as TypeError('fetch failed')
  if (error instanceof TypeError && error.message.includes('fetch failed')) {
    return true;
  }

  const status = statusOf(error);
  if (status !== undefined) {
    return status === 429 || status >= 500;
  }

  return error.cause !== undefined && isTransientError(error.cause);
}

/**
 * Run `fn`, retrying transient failures with exponential backoff
 * (`delayMs * 2^attempt`). The last error is rethrown unchanged.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isTransientError;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= options.retries || !shouldRetry(error)) {
        throw error;
      }
      options.onRetry?.(error, attempt + 1);
      await sleep(options.delayMs * Math.pow(2, attempt));
    }
  }
}
