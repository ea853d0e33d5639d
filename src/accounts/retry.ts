import { OperationCancelled } from "../oauth/errors.js";

export interface RetryPolicy {
  maxAttempts: number;
  /** Delay before retry n is `backoffMs[n - 1]`; the last entry repeats. */
  backoffMs: readonly number[];
}

export interface RetryOptions {
  signal?: AbortSignal;
  shouldRetry: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number; exhausted: boolean };

export function delayBeforeRetry(policy: RetryPolicy, retry: number): number {
  const { backoffMs } = policy;
  return backoffMs[Math.min(retry, backoffMs.length) - 1] ?? 0;
}

/** Resolves after `ms`, or rejects with OperationCancelled as soon as the signal fires. */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationCancelled({ cause: signal.reason }));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new OperationCancelled({ cause: signal?.reason }));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Run `fn` up to `policy.maxAttempts` times. Never throws: the outcome says
 * whether the last error was retryable (`exhausted`) or final.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  opts: RetryOptions,
): Promise<RetryOutcome<T>> {
  const sleep = opts.sleep ?? abortableSleep;

  for (let attempt = 1; ; attempt++) {
    if (opts.signal?.aborted) {
      return { ok: false, error: new OperationCancelled({ cause: opts.signal.reason }), attempts: attempt - 1, exhausted: false };
    }
    try {
      return { ok: true, value: await fn(attempt), attempts: attempt };
    } catch (err) {
      if (!opts.shouldRetry(err)) return { ok: false, error: err, attempts: attempt, exhausted: false };
      if (attempt >= policy.maxAttempts) return { ok: false, error: err, attempts: attempt, exhausted: true };

      const delayMs = delayBeforeRetry(policy, attempt);
      opts.onRetry?.(err, attempt, delayMs);
      try {
        await sleep(delayMs, opts.signal);
      } catch (sleepErr) {
        return { ok: false, error: sleepErr, attempts: attempt, exhausted: false };
      }
    }
  }
}
