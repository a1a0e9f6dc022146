import { sleep } from "./retry.js";
import type { RateLimiter, RateLimiterConfig } from "./types.js";

/**
 * Per-account quota limiter. Tracks quota units spent in a sliding window
 * and a shared backoff deadline: `backoff()` delays every later `acquire()`
 * on the same instance, which is how one worker's rate-limit signal slows
 * down all workers of its account.
 */
export class TokenBucketRateLimiter implements RateLimiter {
  private readonly minDelayMs: number;
  private readonly maxUnits: number;
  private readonly unitsWindowMs: number;

  private unitTimestamps: { ts: number; cost: number }[] = [];
  private backoffUntil = 0;
  private lastCallAt = 0;

  constructor(config: RateLimiterConfig = {}) {
    this.minDelayMs = config.minDelayMs ?? 0;
    this.maxUnits = config.maxUnitsPerWindow ?? Infinity;
    this.unitsWindowMs = config.unitsWindowMs ?? 1_000;
  }

  async acquire(cost = 1, signal?: AbortSignal): Promise<void> {
    // Wait for backoff (rate-limit response); re-check because another
    // worker may extend it while we sleep.
    while (this.backoffUntil > Date.now()) {
      if (signal?.aborted) return;
      await sleep(this.backoffUntil - Date.now(), signal);
    }

    // Enforce min delay between calls
    if (this.minDelayMs > 0) {
      const elapsed = Date.now() - this.lastCallAt;
      if (elapsed < this.minDelayMs) {
        await sleep(this.minDelayMs - elapsed, signal);
      }
    }

    // Enforce unit budget
    if (this.maxUnits < Infinity && cost > 0) {
      this.prune();
      while (
        this.unitTimestamps.length > 0 &&
        this.currentUnits() + cost > this.maxUnits
      ) {
        if (signal?.aborted) return;
        const oldest = this.unitTimestamps[0];
        const waitMs = this.unitsWindowMs - (Date.now() - oldest.ts) + 10;
        await sleep(waitMs, signal);
        this.prune();
      }
      this.unitTimestamps.push({ ts: Date.now(), cost });
    }

    this.lastCallAt = Date.now();
  }

  backoff(retryAfterMs: number): void {
    // Widen, never shorten, a backoff another worker already set.
    this.backoffUntil = Math.max(this.backoffUntil, Date.now() + retryAfterMs);
  }

  private prune(): void {
    const now = Date.now();
    this.unitTimestamps = this.unitTimestamps.filter(
      (u) => now - u.ts < this.unitsWindowMs,
    );
  }

  private currentUnits(): number {
    return this.unitTimestamps.reduce((sum, u) => sum + u.cost, 0);
  }
}

export function createRateLimiter(config: RateLimiterConfig = {}): RateLimiter {
  return new TokenBucketRateLimiter(config);
}
