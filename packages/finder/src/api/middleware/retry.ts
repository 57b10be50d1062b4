import { HttpError, RpcError } from '../../types.js';
import type { AppConfig } from '../../types.js';
import type { Logger } from '../../logger.js';

export type RetryPolicy = Pick<AppConfig, 'maxRetries' | 'retryBaseMs' | 'retryMaxMs'>;

// Load-shedding replies from the ledger service
const RETRYABLE_RPC_ERRORS = new Set(['tooBusy', 'slowDown']);

export function isRetryable(err: unknown): boolean {
  if (err instanceof HttpError) {
    return err.status === 429 || err.status >= 500 || err.status === 0;
  }
  return err instanceof RpcError && RETRYABLE_RPC_ERRORS.has(err.errorCode);
}

export function parseRetryAfter(raw: string | null): number | null {
  if (raw === null) return null;

  // Delta seconds (e.g. "5")
  const seconds = Number(raw);
  if (Number.isFinite(seconds)) {
    return seconds > 0 ? seconds * 1000 : null;
  }

  // HTTP-date (e.g. "Thu, 01 Dec 2025 16:00:00 GMT")
  const date = Date.parse(raw);
  if (Number.isFinite(date)) {
    const delayMs = date - Date.now();
    return delayMs > 0 ? delayMs : null;
  }

  return null;
}

export function backoffDelayMs(err: unknown, attempt: number, policy: RetryPolicy): number {
  const base = policy.retryBaseMs * Math.pow(2, attempt - 1);

  if (err instanceof HttpError && err.status === 429) {
    return Math.min(err.retryAfterMs ?? base, policy.retryMaxMs);
  }

  const jitter = Math.random() * base * 0.3;
  return Math.min(base + jitter, policy.retryMaxMs);
}

export function withRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  logger: Logger,
  operationName: string,
  signal?: AbortSignal,
): () => Promise<T> {
  return async (): Promise<T> => {
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= policy.maxRetries; attempt++) {
      try {
        return await fn();
      } catch (err) {
        if (signal?.aborted === true || !isRetryable(err)) {
          throw err;
        }

        lastError = err;
        if (attempt === policy.maxRetries) break;

        const delayMs = backoffDelayMs(err, attempt, policy);
        logger.warn(
          {
            operationName,
            attempt,
            maxRetries: policy.maxRetries,
            error: err instanceof Error ? err.message : String(err),
            delayMs,
          },
          'Retrying operation',
        );

        await sleep(delayMs, signal);
        if (signal?.aborted) break;
      }
    }

    throw lastError ?? new HttpError('Max retries exceeded', 0, 'UNKNOWN', '');
  };
}

// Wakes early when the signal aborts
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const wake = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', wake);
      resolve();
    };
    const timer = setTimeout(wake, ms);
    signal?.addEventListener('abort', wake, { once: true });
  });
}
