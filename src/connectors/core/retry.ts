import type { RetryPolicy } from "./types.js";

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 10,
  baseDelayMs: 1000,
  maxDelayMs: 64_000,
};

/**
 * Delay before retry number `attempt` (0-based): exponential, capped at
 * `maxDelayMs`, plus up to 10% jitter.
 */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const delay = Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);
  const jitter = delay * 0.1 * Math.random();
  return Math.round(delay + jitter);
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }
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
}
