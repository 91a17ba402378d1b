/**
 * Shared cache contract
 *
 * The operations the service needs from a cache shared by all instances,
 * each one atomic on the cache side.
 */

export interface SlidingWindowHit {
  /** Whether the hit was recorded (false: the window was full) */
  allowed: boolean;
  /** Entries in the window after this call */
  count: number;
  /** Timestamp (ms) of the oldest entry still in the window, if any */
  oldest: number | null;
}

export interface SlidingWindowCount {
  count: number;
  oldest: number | null;
}

export interface SharedCache {
  /**
   * Drop entries at or before `now - windowMs`, then record `now` if fewer
   * than `limit` entries remain.
   */
  slidingWindowHit(key: string, now: number, windowMs: number, limit: number): Promise<SlidingWindowHit>;
  /** Count entries newer than `now - windowMs` without recording */
  slidingWindowCount(key: string, now: number, windowMs: number): Promise<SlidingWindowCount>;
  setWithTtl(key: string, value: string, ttlMs: number): Promise<void>;
  exists(key: string): Promise<boolean>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
