/**
 * Circuit breaker for the shared cache
 *
 * CLOSED passes calls through and counts failures inside a sliding window.
 * OPEN rejects at once until `resetTimeout` has passed, then HALF_OPEN lets
 * probes through: `successThreshold` successes close it, one failure reopens.
 */

import { createLogger } from "../logging";

const log = createLogger("circuit-breaker");

export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerConfig {
  name: string;
  /** Failures inside `monitorWindow` that open the circuit */
  failureThreshold: number;
  /** Probe successes that close a half-open circuit */
  successThreshold: number;
  /** Milliseconds spent open before probing */
  resetTimeout: number;
  monitorWindow: number;
  now: () => number;
  onStateChange?: (from: CircuitState, to: CircuitState) => void;
}

export interface CircuitBreakerStats {
  state: CircuitState;
  recentFailures: number;
  /** Calls refused while open */
  rejected: number;
}

export class CircuitBreakerError extends Error {
  constructor(
    name: string,
    public readonly retryAfter: number
  ) {
    super(`Circuit breaker "${name}" is OPEN`);
    this.name = "CircuitBreakerError";
  }
}

export class CircuitBreaker {
  private state: CircuitState = "CLOSED";
  private failures: number[] = [];
  private probeSuccesses = 0;
  private openedAt = 0;
  private rejected = 0;

  constructor(private readonly config: CircuitBreakerConfig) {}

  /**
   * @throws CircuitBreakerError without calling `fn` while the circuit is open
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (!this.admit()) {
      this.rejected++;
      throw new CircuitBreakerError(this.config.name, this.getRetryAfter());
    }

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      this.onFailure(error);
      throw error;
    }
    this.onSuccess();
    return result;
  }

  getState(): CircuitState {
    return this.state;
  }

  /** Seconds until an open circuit probes again; 0 otherwise */
  getRetryAfter(): number {
    if (this.state !== "OPEN") return 0;
    const remaining = this.openedAt + this.config.resetTimeout - this.config.now();
    return Math.max(0, Math.ceil(remaining / 1000));
  }

  getStats(): CircuitBreakerStats {
    return { state: this.state, recentFailures: this.recentFailures().length, rejected: this.rejected };
  }

  private admit(): boolean {
    if (this.state !== "OPEN") return true;
    if (this.config.now() - this.openedAt < this.config.resetTimeout) return false;
    this.transitionTo("HALF_OPEN");
    return true;
  }

  private onSuccess(): void {
    if (this.state !== "HALF_OPEN") return;
    this.probeSuccesses++;
    if (this.probeSuccesses >= this.config.successThreshold) {
      this.transitionTo("CLOSED");
    }
  }

  private onFailure(error: unknown): void {
    if (this.state === "HALF_OPEN") {
      this.transitionTo("OPEN");
      return;
    }

    this.failures = this.recentFailures();
    this.failures.push(this.config.now());
    if (this.state === "CLOSED" && this.failures.length >= this.config.failureThreshold) {
      log.warn("Failure threshold reached, opening circuit", {
        name: this.config.name,
        failures: this.failures.length,
        error: error instanceof Error ? error : new Error(String(error)),
      });
      this.transitionTo("OPEN");
    }
  }

  private recentFailures(): number[] {
    const windowStart = this.config.now() - this.config.monitorWindow;
    return this.failures.filter((t) => t >= windowStart);
  }

  private transitionTo(next: CircuitState): void {
    const previous = this.state;
    this.state = next;
    this.probeSuccesses = 0;
    if (next === "OPEN") this.openedAt = this.config.now();
    if (next === "CLOSED") this.failures = [];

    log.info("State transition", { name: this.config.name, from: previous, to: next });
    this.config.onStateChange?.(previous, next);
  }
}
