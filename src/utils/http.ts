import { withRetry } from './retry.js';

export interface RequestPolicy {
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
}

export const DEFAULT_REQUEST_POLICY: RequestPolicy = {
  timeoutMs: 30000,
  maxRetries: 2,
  retryDelayMs: 500,
};

export class HttpStatusError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, statusText: string, body: string) {
    super(extractErrorDetail(body) ?? `HTTP ${status} ${statusText}`.trim());
    this.name = 'HttpStatusError';
    this.status = status;
    this.body = body;
  }
}

// Providers report errors as {"error": {"message": ...}} or {"error": "..."}
function extractErrorDetail(body: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed !== 'object' || parsed === null || !('error' in parsed)) {
      return body.trim() || undefined;
    }
    const error = parsed.error;
    if (typeof error === 'string') return error;
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
      return error.message;
    }
  } catch {
    return body.trim() || undefined;
  }
  return undefined;
}

export interface JsonRequest {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
}

/**
 * fetch + JSON decode with a per-attempt timeout and retry on transient failures.
 */
export async function fetchJson(
  url: string,
  request: JsonRequest,
  policy: RequestPolicy,
  onRetry?: (error: unknown, attempt: number) => void
): Promise<unknown> {
  return withRetry(
    async () => {
      const response = await fetch(url, {
        method: request.method ?? 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...request.headers,
        },
        body: request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: AbortSignal.timeout(policy.timeoutMs),
      });

      if (!response.ok) {
        throw new HttpStatusError(response.status, response.statusText, await response.text());
      }

      const data: unknown = await response.json();
      return data;
    },
    {
      retries: policy.maxRetries,
      delayMs: policy.retryDelayMs,
      onRetry,
    }
  );
}
