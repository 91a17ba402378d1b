/**
 * Sliding window rate limiter
 *
 * Rejected requests are not recorded, so a client that keeps retrying while
 * blocked regains budget as its earlier requests age out.
 */

import type { GuardedCache } from "../cache/guarded";
import { CacheRateLimitStore } from "./cache-store";
import { MemoryRateLimitStore, type MemoryStoreOptions } from "./memory-store";
import type { RateLimitConfig, RateLimitResult, RateLimitStatus, RateLimitStore } from "./types";

export class RateLimiter {
  private readonly now: () => number;

  constructor(
    private readonly store: RateLimitStore,
    readonly config: RateLimitConfig,
    now: () => number = Date.now
  ) {
    this.now = now;
  }

  storeKey(clientKey: string): string {
    return `rl:${this.config.name}:${clientKey}`;
  }

  /**
   * Count one request against the client's window
   */
  async check(clientKey: string): Promise<RateLimitResult> {
    const now = this.now();
    const { maxRequests: limit, windowMs } = this.config;
    const hit = await this.store.hit(this.storeKey(clientKey), windowMs, limit, now);
    const resetAt = (hit.oldest ?? now) + windowMs;

    if (!hit.allowed) {
      return {
        allowed: false,
        limit,
        remaining: 0,
        resetAt,
        retryAfterSeconds: Math.max(1, Math.ceil((resetAt - now) / 1000)),
      };
    }

    return { allowed: true, limit, remaining: Math.max(0, limit - hit.count), resetAt };
  }

  /**
   * Current usage without recording a request
   */
  async status(clientKey: string): Promise<RateLimitStatus> {
    const now = this.now();
    const { maxRequests: limit, windowMs } = this.config;
    const { count, oldest } = await this.store.count(this.storeKey(clientKey), windowMs, now);

    return {
      count,
      limit,
      remaining: Math.max(0, limit - count),
      resetAt: oldest === null ? null : oldest + windowMs,
    };
  }

  describe() {
    return this.store.describe();
  }

  close(): Promise<void> {
    return this.store.close();
  }
}

/**
 * Pick the store: shared when a cache is configured, otherwise in-process
 * for the life of the process
 */
export function createRateLimitStore(
  cache: GuardedCache | null,
  options: MemoryStoreOptions = {}
): RateLimitStore {
  const memory = new MemoryRateLimitStore(options);
  return cache ? new CacheRateLimitStore(cache, memory) : memory;
}
