/**
 * GET /api/health
 *
 * A failed database check makes the service unhealthy (503). A degraded
 * shared cache or a large heap only marks it degraded: limiting and
 * revocation keep working on in-process state.
 */

import type { RateLimitMode } from "../rate-limit";

export type HealthStatus = "healthy" | "degraded" | "unhealthy";

export interface HealthCheckResult {
  status: "ok" | "error";
  latencyMs?: number;
  error?: string;
  details?: Record<string, unknown>;
}

export interface HealthResponse {
  status: HealthStatus;
  timestamp: string;
  /** Seconds since the check was created */
  uptime: number;
  version: string;
  checks: {
    database: HealthCheckResult;
    rateLimiter: HealthCheckResult;
    memory: HealthCheckResult;
  };
}

export interface HealthDependencies {
  pingDatabase: () => Promise<void>;
  rateLimiter: () => { mode: RateLimitMode; degraded: boolean; entries: number };
  version?: string;
  memoryThresholdMB?: number;
  now?: () => number;
}

const toMB = (bytes: number) => Math.round(bytes / (1024 * 1024));

export async function checkDatabase(ping: () => Promise<void>): Promise<HealthCheckResult> {
  const startedAt = performance.now();
  const latency = () => Number((performance.now() - startedAt).toFixed(2));
  try {
    await ping();
    return { status: "ok", latencyMs: latency() };
  } catch (err) {
    const message = err instanceof Error ? err.message : "Database check failed";
    return { status: "error", latencyMs: latency(), error: message };
  }
}

export function checkRateLimiter(describe: HealthDependencies["rateLimiter"]): HealthCheckResult {
  const details = describe();
  return { status: details.degraded ? "error" : "ok", details };
}

export function checkMemory(thresholdMB: number): HealthCheckResult {
  const { heapUsed, rss } = process.memoryUsage();
  const heapUsedMB = toMB(heapUsed);
  const details = { heapUsedMB, rssMB: toMB(rss), thresholdMB };

  if (heapUsedMB > thresholdMB) {
    return { status: "error", details, error: `Heap usage ${heapUsedMB}MB is above ${thresholdMB}MB` };
  }
  return { status: "ok", details };
}

export function createHealthCheck(deps: HealthDependencies): () => Promise<HealthResponse> {
  const now = deps.now ?? Date.now;
  const bootedAt = now();

  return async () => {
    const checks = {
      database: await checkDatabase(deps.pingDatabase),
      rateLimiter: checkRateLimiter(deps.rateLimiter),
      memory: checkMemory(deps.memoryThresholdMB ?? 512),
    };

    let status: HealthStatus = "healthy";
    if (checks.database.status === "error") status = "unhealthy";
    else if (checks.rateLimiter.status === "error" || checks.memory.status === "error") status = "degraded";

    const at = now();
    return {
      status,
      timestamp: new Date(at).toISOString(),
      uptime: Math.round((at - bootedAt) / 1000),
      version: deps.version ?? "0.1.0",
      checks,
    };
  };
}
