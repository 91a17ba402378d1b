/**
 * Shared cache calls with a deadline and a circuit breaker
 *
 * Every call either returns the cache's answer or throws quickly; callers
 * catch and fall back to in-process state. Availability changes are logged
 * once per transition rather than once per request.
 */

import { withTimeout } from "../api/timeout";
import { createLogger } from "../logging";
import { CircuitBreaker } from "../utils/circuit-breaker";
import type { SharedCache } from "./types";

const log = createLogger("cache");

export interface GuardedCacheOptions {
  timeoutMs: number;
  now?: () => number;
  /** Consecutive failures before the breaker opens */
  failureThreshold?: number;
  /** Milliseconds the breaker stays open before probing again */
  resetTimeoutMs?: number;
}

export class GuardedCache {
  private readonly breaker: CircuitBreaker;
  private readonly timeoutMs: number;
  private degraded = false;

  constructor(
    private readonly cache: SharedCache,
    options: GuardedCacheOptions
  ) {
    this.timeoutMs = options.timeoutMs;
    this.breaker = new CircuitBreaker({
      name: "shared-cache",
      failureThreshold: options.failureThreshold ?? 3,
      successThreshold: 1,
      resetTimeout: options.resetTimeoutMs ?? 5_000,
      monitorWindow: 30_000,
      now: options.now ?? Date.now,
    });
  }

  /**
   * Run one cache operation
   *
   * @throws the underlying error, TimeoutError or CircuitBreakerError
   */
  async run<T>(operation: string, fn: (cache: SharedCache) => Promise<T>): Promise<T> {
    try {
      const result = await this.breaker.execute(() => withTimeout(fn(this.cache), this.timeoutMs, operation));
      this.markHealthy();
      return result;
    } catch (error) {
      this.markDegraded(operation, error);
      throw error;
    }
  }

  /** True while the last call failed */
  isDegraded(): boolean {
    return this.degraded;
  }

  getBreakerState() {
    return this.breaker.getState();
  }

  close(): Promise<void> {
    return this.cache.close();
  }

  private markHealthy(): void {
    if (this.degraded) {
      this.degraded = false;
      log.info("Shared cache recovered");
    }
  }

  private markDegraded(operation: string, error: unknown): void {
    if (!this.degraded) {
      this.degraded = true;
      log.warn("Shared cache unavailable, using in-process fallback", {
        operation,
        error: error instanceof Error ? error : new Error(String(error)),
      });
    }
  }
}
