/**
 * Shared-cache sliding window store
 *
 * Windows live in the shared cache so every instance sees the same counts.
 * When a cache call fails or times out the request is counted in-process
 * instead; clients never see the difference.
 */

import type { GuardedCache } from "../cache/guarded";
import type { SlidingWindowCount, SlidingWindowHit } from "../cache/types";
import type { MemoryRateLimitStore } from "./memory-store";
import type { RateLimitStore } from "./types";

export class CacheRateLimitStore implements RateLimitStore {
  constructor(
    private readonly cache: GuardedCache,
    private readonly fallback: MemoryRateLimitStore
  ) {}

  async hit(key: string, windowMs: number, limit: number, now: number): Promise<SlidingWindowHit> {
    try {
      return await this.cache.run("rate-limit hit", (c) => c.slidingWindowHit(key, now, windowMs, limit));
    } catch {
      return this.fallback.hitSync(key, windowMs, limit, now);
    }
  }

  async count(key: string, windowMs: number, now: number): Promise<SlidingWindowCount> {
    try {
      return await this.cache.run("rate-limit status", (c) => c.slidingWindowCount(key, now, windowMs));
    } catch {
      return this.fallback.count(key, windowMs, now);
    }
  }

  describe() {
    return {
      mode: "shared" as const,
      degraded: this.cache.isDegraded(),
      entries: this.fallback.describe().entries,
    };
  }

  async close(): Promise<void> {
    await this.fallback.close();
  }
}
