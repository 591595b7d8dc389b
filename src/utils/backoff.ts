/** Delay in milliseconds to wait after failed attempt number `attempt` (1-based). */
export type BackoffPolicy = (attempt: number) => number;

export type BackoffKind = "linear" | "exponential" | "constant";

export type LinearJitterOptions = {
  baseMs: number;
  /** Upper bound (exclusive) of the random extra delay. */
  jitterMs?: number;
  /** Source of randomness in [0, 1). Defaults to Math.random. */
  random?: () => number;
};

export type ExponentialOptions = {
  baseMs: number;
  maxMs?: number;
};

/** `base * attempt + random jitter` */
export function linearJitterBackoff(opts: LinearJitterOptions): BackoffPolicy {
  const jitterMs = opts.jitterMs ?? 0;
  const random = opts.random ?? Math.random;
  return (attempt) => opts.baseMs * attempt + Math.floor(random() * jitterMs);
}

/** `base * 2^(attempt - 1)`, capped at `maxMs` */
export function exponentialBackoff(opts: ExponentialOptions): BackoffPolicy {
  const maxMs = opts.maxMs ?? Number.POSITIVE_INFINITY;
  return (attempt) => Math.min(opts.baseMs * 2 ** (attempt - 1), maxMs);
}

export function constantBackoff(delayMs: number): BackoffPolicy {
  return () => delayMs;
}

export type BackoffSettings = {
  kind: BackoffKind;
  baseMs: number;
  jitterMs: number;
  maxMs: number;
};

export function createBackoff(settings: BackoffSettings, random?: () => number): BackoffPolicy {
  switch (settings.kind) {
    case "linear":
      return linearJitterBackoff({ baseMs: settings.baseMs, jitterMs: settings.jitterMs, random });
    case "exponential":
      return exponentialBackoff({ baseMs: settings.baseMs, maxMs: settings.maxMs });
    case "constant":
      return constantBackoff(settings.baseMs);
  }
}
