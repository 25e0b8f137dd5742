import { errorMessage } from "../errors";

export interface RetryOptions {
  /** Extra attempts after the first; total attempts = maxRetries + 1. */
  maxRetries: number;
  sleep: (ms: number) => Promise<void>;
  /** Delay before retry n (0-based) is baseDelayMs * 2^n. */
  baseDelayMs?: number;
  onRetry?: (info: { attempt: number; error: unknown; delayMs: number }) => void;
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; message: string; attempts: number };

export function backoffDelay(attempt: number, baseDelayMs = 1000): number {
  return baseDelayMs * Math.pow(2, attempt);
}

/**
 * Run `fn` until it resolves or the attempt budget is spent.
 * Waits 1s, 2s, 4s, ... between attempts; never sleeps after the last one.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<RetryResult<T>> {
  const total = Math.max(0, Math.floor(opts.maxRetries)) + 1;
  let lastError: unknown;
  for (let attempt = 0; attempt < total; attempt++) {
    try {
      const value = await fn(attempt);
      return { ok: true, value, attempts: attempt + 1 };
    } catch (e) {
      lastError = e;
      if (attempt < total - 1) {
        const delayMs = backoffDelay(attempt, opts.baseDelayMs);
        opts.onRetry?.({ attempt, error: e, delayMs });
        await opts.sleep(delayMs);
      }
    }
  }
  return { ok: false, error: lastError, message: errorMessage(lastError), attempts: total };
}
