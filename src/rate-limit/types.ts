import type { SlidingWindowCount, SlidingWindowHit } from "../cache/types";

export type RateLimitMode = "shared" | "in-process";

/**
 * Backing store for sliding windows
 *
 * `hit` trims, counts and records in one atomic step; `count` never records.
 */
export interface RateLimitStore {
  hit(key: string, windowMs: number, limit: number, now: number): Promise<SlidingWindowHit>;
  count(key: string, windowMs: number, now: number): Promise<SlidingWindowCount>;
  describe(): { mode: RateLimitMode; degraded: boolean; entries: number };
  close(): Promise<void>;
}

export interface RateLimitConfig {
  /** Maximum requests allowed in the window */
  maxRequests: number;
  /** Window duration in milliseconds */
  windowMs: number;
  /** Unique key for this limiter (e.g., "api") */
  name: string;
}

export type RateLimitResult =
  | { allowed: true; limit: number; remaining: number; resetAt: number }
  | { allowed: false; limit: number; remaining: 0; resetAt: number; retryAfterSeconds: number };

export interface RateLimitStatus {
  count: number;
  limit: number;
  remaining: number;
  resetAt: number | null;
}
