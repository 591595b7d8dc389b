import type { BackoffPolicy } from "./backoff.js";
import { exponentialBackoff } from "./backoff.js";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type AttemptResult<T> = { ok: true; value: T } | { ok: false; error: string };

export type RetryOptions = {
  /** Extra attempts after the first one. */
  retries?: number;
  backoff?: BackoffPolicy;
  /** Checked between attempts. An attempt in progress is never interrupted. */
  signal?: AbortSignal;
  sleep?: Sleep;
  onRetry?: (attempt: number, delayMs: number, error: string) => void;
};

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: string; attempts: number; aborted: boolean };

const DEFAULTS = {
  retries: 2,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
};

/** Resolves after `ms`, or as soon as `signal` aborts. */
export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) return resolve();
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * Run `fn` up to `retries + 1` times until it reports success. A thrown error
 * counts as a failed attempt.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<AttemptResult<T>>,
  opts?: RetryOptions,
): Promise<RetryOutcome<T>> {
  const retries = opts?.retries ?? DEFAULTS.retries;
  const backoff = opts?.backoff ?? exponentialBackoff({ baseMs: DEFAULTS.baseDelayMs, maxMs: DEFAULTS.maxDelayMs });
  const wait = opts?.sleep ?? sleep;

  let lastError = "";
  for (let attempt = 1; attempt <= retries + 1; attempt++) {
    let result: AttemptResult<T>;
    try {
      result = await fn(attempt);
    } catch (err) {
      result = { ok: false, error: err instanceof Error ? err.message : String(err) };
    }
    if (result.ok) return { ok: true, value: result.value, attempts: attempt };

    lastError = result.error;
    if (attempt > retries) break;
    if (opts?.signal?.aborted) {
      return { ok: false, error: lastError, attempts: attempt, aborted: true };
    }

    const delay = backoff(attempt);
    opts?.onRetry?.(attempt, delay, lastError);
    await wait(delay, opts?.signal);

    if (opts?.signal?.aborted) {
      return { ok: false, error: lastError, attempts: attempt, aborted: true };
    }
  }
  return { ok: false, error: lastError, attempts: retries + 1, aborted: false };
}

