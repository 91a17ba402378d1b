/**
 * Graceful shutdown
 *
 * Once a signal arrives, new requests get 503, in-flight requests are given
 * `drainTimeoutMs` to finish, and registered steps (HTTP server, limiter,
 * cache, database) run in registration order.
 */

import type { MiddlewareHandler } from "hono";
import { createLogger } from "../logging";
import { errorFromCode, ApiError } from "./error-codes";

const log = createLogger("shutdown");

type ShutdownStep = () => Promise<void> | void;

export interface ShutdownOptions {
  drainTimeoutMs?: number;
  exit?: (code: number) => void;
}

export class ShutdownCoordinator {
  private inFlight = 0;
  private idle: Array<() => void> = [];
  private steps: Array<{ name: string; run: ShutdownStep }> = [];
  private started: Promise<void> | null = null;

  get shuttingDown(): boolean {
    return this.started !== null;
  }

  get activeRequests(): number {
    return this.inFlight;
  }

  onShutdown(name: string, run: ShutdownStep): void {
    this.steps.push({ name, run });
  }

  middleware(): MiddlewareHandler {
    return async (c, next) => {
      if (this.shuttingDown) {
        c.header("Connection", "close");
        c.header("Retry-After", "60");
        return errorFromCode(c, ApiError.SERVICE_UNAVAILABLE, "Server is shutting down");
      }

      this.inFlight++;
      try {
        await next();
      } finally {
        this.inFlight--;
        if (this.inFlight === 0) this.idle.splice(0).forEach((wake) => wake());
      }
    };
  }

  /**
   * Idempotent; a second signal joins the shutdown already under way
   */
  shutdown(signal: string, options: ShutdownOptions = {}): Promise<void> {
    if (!this.started) {
      this.started = this.run(signal, options);
    }
    return this.started;
  }

  private async run(signal: string, options: ShutdownOptions): Promise<void> {
    const exit = options.exit ?? ((code: number) => process.exit(code));
    const startedAt = Date.now();
    log.info("Starting graceful shutdown", { signal, activeRequests: this.inFlight });

    const drained = await this.drain(options.drainTimeoutMs ?? 30_000);
    if (!drained) {
      log.warn("Requests still active after drain timeout", { remaining: this.inFlight });
    }

    for (const step of this.steps) {
      try {
        await step.run();
        log.debug("Shutdown step completed", { step: step.name });
      } catch (err) {
        log.error("Shutdown step failed", { step: step.name, error: err });
      }
    }

    log.info("Graceful shutdown completed", { durationMs: Date.now() - startedAt });
    exit(drained ? 0 : 1);
  }

  private drain(timeoutMs: number): Promise<boolean> {
    if (this.inFlight === 0) return Promise.resolve(true);

    return new Promise((resolve) => {
      const wake = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.idle = this.idle.filter((waiter) => waiter !== wake);
        resolve(false);
      }, timeoutMs);
      this.idle.push(wake);
    });
  }
}

/** The coordinator the process signal handlers drive */
export const processShutdown = new ShutdownCoordinator();

export function shutdownMiddleware(): MiddlewareHandler {
  return processShutdown.middleware();
}

export function onShutdown(name: string, run: ShutdownStep): void {
  processShutdown.onShutdown(name, run);
}

export function gracefulShutdown(signal: string, options?: ShutdownOptions): Promise<void> {
  return processShutdown.shutdown(signal, options);
}

export function installShutdownHandlers(options: ShutdownOptions = {}): void {
  const handle = (signal: string) => {
    gracefulShutdown(signal, options).catch((err: unknown) => {
      log.error("Graceful shutdown failed", { signal, error: err });
      process.exit(1);
    });
  };

  process.on("SIGTERM", () => handle("SIGTERM"));
  process.on("SIGINT", () => handle("SIGINT"));
  process.on("uncaughtException", (err) => {
    log.error("Uncaught exception", { error: err });
    handle("uncaughtException");
  });
  // Logged only; a stray rejection does not take the server down
  process.on("unhandledRejection", (reason) => {
    log.error("Unhandled rejection", { error: reason });
  });
}
