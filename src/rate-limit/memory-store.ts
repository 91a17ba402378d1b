/**
 * In-process sliding window store
 *
 * Each `hit` runs to completion without yielding, so concurrent requests in
 * this process are serialized per key. Memory is bounded by TTL cleanup on
 * an interval plus LRU eviction at capacity.
 */

import type { SlidingWindowCount, SlidingWindowHit } from "../cache/types";
import { createLogger } from "../logging";
import type { RateLimitStore } from "./types";

const log = createLogger("rate-limiter");

interface WindowState {
  requests: number[];
  /** Last access timestamp for LRU eviction */
  lastAccess: number;
  /** Creation timestamp for absolute TTL */
  createdAt: number;
}

export interface MemoryStoreOptions {
  /** Maximum tracked keys before LRU eviction (default 100k) */
  maxEntries?: number;
  /** Entries older than this are dropped regardless of activity (default 1h) */
  absoluteTtlMs?: number;
  /** Cleanup period (default 5 minutes) */
  cleanupIntervalMs?: number;
  /** Entries evicted at once when inserting at capacity (default 100) */
  evictionBatchSize?: number;
  now?: () => number;
}

export class MemoryRateLimitStore implements RateLimitStore {
  private readonly windows = new Map<string, WindowState>();
  private readonly maxEntries: number;
  private readonly absoluteTtlMs: number;
  private readonly cleanupIntervalMs: number;
  private readonly evictionBatchSize: number;
  private readonly now: () => number;
  private cleanupIntervalId: ReturnType<typeof setInterval> | null = null;

  constructor(options: MemoryStoreOptions = {}) {
    this.maxEntries = options.maxEntries ?? 100_000;
    this.absoluteTtlMs = options.absoluteTtlMs ?? 3_600_000;
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? 300_000;
    this.evictionBatchSize = options.evictionBatchSize ?? 100;
    this.now = options.now ?? Date.now;

    this.cleanupIntervalId = setInterval(() => this.cleanup(), this.cleanupIntervalMs);
    // Unref to allow process to exit even if interval is running
    this.cleanupIntervalId.unref();
  }

  async hit(key: string, windowMs: number, limit: number, now: number): Promise<SlidingWindowHit> {
    return this.hitSync(key, windowMs, limit, now);
  }

  async count(key: string, windowMs: number, now: number): Promise<SlidingWindowCount> {
    const state = this.windows.get(key);
    if (!state) return { count: 0, oldest: null };

    const active = state.requests.filter((t) => t > now - windowMs);
    return { count: active.length, oldest: active[0] ?? null };
  }

  describe() {
    return { mode: "in-process" as const, degraded: false, entries: this.windows.size };
  }

  async close(): Promise<void> {
    if (this.cleanupIntervalId !== null) {
      clearInterval(this.cleanupIntervalId);
      this.cleanupIntervalId = null;
    }
    this.windows.clear();
  }

  /**
   * Record a hit unless the window is full
   */
  hitSync(key: string, windowMs: number, limit: number, now: number): SlidingWindowHit {
    const windowStart = now - windowMs;

    let state = this.windows.get(key);
    if (!state) {
      if (this.windows.size >= this.maxEntries) {
        this.evictLRU(this.evictionBatchSize);
      }
      state = { requests: [], lastAccess: now, createdAt: now };
      this.windows.set(key, state);
    } else {
      state.lastAccess = now;
    }

    // In-place trim; timestamps are appended in order
    let writeIndex = 0;
    for (const timestamp of state.requests) {
      if (timestamp > windowStart) {
        state.requests[writeIndex++] = timestamp;
      }
    }
    state.requests.length = writeIndex;

    const allowed = state.requests.length < limit;
    if (allowed) {
      state.requests.push(now);
    }

    return { allowed, count: state.requests.length, oldest: state.requests[0] ?? null };
  }

  /**
   * Remove stale entries, then evict down to 90% capacity if still over
   */
  cleanup(): number {
    const now = this.now();
    let deleted = 0;

    for (const [key, state] of this.windows) {
      const entryAge = now - state.createdAt;
      const idle = now - state.lastAccess;
      if (entryAge > this.absoluteTtlMs || idle > this.cleanupIntervalMs * 2) {
        this.windows.delete(key);
        deleted++;
      }
    }

    if (this.windows.size > this.maxEntries) {
      log.warn("Store size exceeds maximum after TTL cleanup, performing LRU eviction", {
        currentSize: this.windows.size,
        maxSize: this.maxEntries,
      });
      deleted += this.evictLRU(this.windows.size - Math.floor(this.maxEntries * 0.9));
    }

    if (deleted > 0) {
      log.debug("Cleaned up stale entries", { deleted, remaining: this.windows.size });
    }
    return deleted;
  }

  private evictLRU(count: number): number {
    if (this.windows.size === 0 || count <= 0) return 0;

    const oldestFirst = Array.from(this.windows.entries()).sort((a, b) => a[1].lastAccess - b[1].lastAccess);
    const toEvict = Math.min(count, oldestFirst.length);
    for (const [key] of oldestFirst.slice(0, toEvict)) {
      this.windows.delete(key);
    }
    return toEvict;
  }
}
