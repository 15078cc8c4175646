/**
 * Capped exponential backoff with jitter.
 *
 *   delay = min(cap, base * 2^retries + jitter)
 *
 * Grows with every consecutive failure and never exceeds `capMs`. Callers own
 * the retry counter and reset it to zero after a successful cycle.
 */

export interface BackoffOptions {
  /** Delay for the first retry (retries = 0), before jitter. */
  baseMs: number;
  /** Upper bound for any computed delay. */
  capMs: number;
  /** Jitter is drawn uniformly from [0, jitterMs). Default 1000. */
  jitterMs?: number;
  /** Source of randomness in [0, 1). Injected by tests. */
  random?: () => number;
}

export function computeBackoff(retries: number, options: BackoffOptions): number {
  const jitterMs = options.jitterMs ?? 1000;
  const random = options.random ?? Math.random;
  const exponent = Math.max(0, Math.floor(retries));
  // 2^exponent overflows to Infinity long before it matters; min() still caps it.
  const raw = options.baseMs * 2 ** exponent + random() * jitterMs;
  return Math.min(options.capMs, raw);
}

/**
 * Sleep that resolves early (without throwing) when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
