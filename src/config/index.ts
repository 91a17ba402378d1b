/**
 * Process configuration
 *
 * Read once from the environment at startup and validated with zod. Any
 * invalid value stops the process before it binds a port.
 */

import { randomBytes } from "node:crypto";
import { normalize, resolve } from "node:path";
import { z } from "zod";
import { LOG_LEVELS, createLogger, setLogLevel, type LogLevel } from "../logging";

const log = createLogger("config");

export const MIN_SECRET_LENGTH = 32;
export const DEFAULT_CSRF_EXEMPT_PATHS = ["/api/auth/login", "/api/auth/register"];

// Browser front ends served by the dev tooling
const DEV_ORIGINS = ["http://localhost:3000", "http://127.0.0.1:3000"];

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export interface AppConfig {
  env: "development" | "production" | "test";
  isProduction: boolean;
  server: { port: number; allowedOrigins: string[] };
  database: { path: string; busyTimeoutMs: number };
  session: { secret: string; secretConfigured: boolean; ttlSeconds: number };
  passwords: { bcryptRounds: number };
  rateLimit: { maxRequests: number; windowMs: number };
  csrf: { enabled: boolean; exemptPaths: string[] };
  /** null keeps the built-in private-network ranges */
  network: { trustedProxyCidrs: string[] | null };
  /** A null url runs every limiter and the denylist in-process */
  cache: { url: string | null; timeoutMs: number };
  timeouts: { authMs: number };
  logging: { level: LogLevel };
}

// ==================== Schema ====================

const int = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const flag = (fallback: boolean) =>
  z
    .enum(["true", "false", "1", "0"])
    .default(fallback ? "true" : "false")
    .transform((value) => value === "true" || value === "1");

const commaList = z.string().transform((value) =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
);

const databasePath = z
  .string()
  .min(1)
  .default("./data/kanban.db")
  .superRefine((path, ctx) => {
    // ".." as a whole segment; names like "..." stay valid
    if (normalize(path).split(/[/\\]/).includes("..")) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `path traversal detected in "${path}"` });
    }
  })
  .transform((path) => (path === ":memory:" ? path : resolve(normalize(path))));

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: int(8000, 1, 65_535),
  ALLOWED_ORIGINS: commaList.optional(),

  DATABASE_PATH: databasePath,
  DB_BUSY_TIMEOUT_MS: int(5_000, 0, 60_000),

  SESSION_SECRET: z.string().min(MIN_SECRET_LENGTH, `must be at least ${MIN_SECRET_LENGTH} characters`).optional(),
  SESSION_TTL_SECONDS: int(7 * 24 * 3600, 60, 30 * 24 * 3600),
  BCRYPT_ROUNDS: int(12, 4, 15),

  RATE_LIMIT_MAX_REQUESTS: int(100, 1, 1_000_000),
  RATE_LIMIT_WINDOW_MS: int(60_000, 1_000, 24 * 3600 * 1000),

  CSRF_ENABLED: flag(true),
  CSRF_EXEMPT_PATHS: commaList.default(DEFAULT_CSRF_EXEMPT_PATHS.join(",")),
  TRUSTED_PROXY_CIDRS: commaList.optional(),

  REDIS_URL: z.string().url().optional(),
  CACHE_TIMEOUT_MS: int(50, 1, 10_000),
  AUTH_TIMEOUT_MS: int(5_000, 10, 60_000),

  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join(", ");
}

// ==================== Loading ====================

/**
 * @throws ConfigurationError for any invalid value, and in production for a
 *   missing SESSION_SECRET
 */
export function loadConfig(source: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${describeIssues(parsed.error)}`);
  }
  const env = parsed.data;
  const isProduction = env.NODE_ENV === "production";

  if (isProduction && env.SESSION_SECRET === undefined) {
    throw new ConfigurationError(
      `SESSION_SECRET is required in production (must be at least ${MIN_SECRET_LENGTH} characters)`
    );
  }
  // An ephemeral secret needs NODE_ENV spelled out, not defaulted
  if (env.SESSION_SECRET === undefined && source.NODE_ENV === undefined) {
    throw new ConfigurationError("SESSION_SECRET is required unless NODE_ENV is set to development or test");
  }

  setLogLevel(env.LOG_LEVEL);
  if (env.SESSION_SECRET === undefined && env.NODE_ENV === "development") {
    // Every restart invalidates outstanding session tokens
    log.warn("SESSION_SECRET not set, generated an ephemeral secret for this process");
  }

  const origins = env.ALLOWED_ORIGINS ?? [];

  return {
    env: env.NODE_ENV,
    isProduction,
    server: {
      port: env.PORT,
      allowedOrigins: isProduction ? origins : [...new Set([...origins, ...DEV_ORIGINS])],
    },
    database: { path: env.DATABASE_PATH, busyTimeoutMs: env.DB_BUSY_TIMEOUT_MS },
    session: {
      secret: env.SESSION_SECRET ?? randomBytes(32).toString("base64url"),
      secretConfigured: env.SESSION_SECRET !== undefined,
      ttlSeconds: env.SESSION_TTL_SECONDS,
    },
    passwords: { bcryptRounds: env.BCRYPT_ROUNDS },
    rateLimit: { maxRequests: env.RATE_LIMIT_MAX_REQUESTS, windowMs: env.RATE_LIMIT_WINDOW_MS },
    csrf: { enabled: env.CSRF_ENABLED, exemptPaths: env.CSRF_EXEMPT_PATHS },
    network: { trustedProxyCidrs: env.TRUSTED_PROXY_CIDRS ?? null },
    cache: { url: env.REDIS_URL ?? null, timeoutMs: env.CACHE_TIMEOUT_MS },
    timeouts: { authMs: env.AUTH_TIMEOUT_MS },
    logging: { level: env.LOG_LEVEL },
  };
}

/**
 * Startup log line; the secret and cache URL (which may embed a password)
 * are left out
 */
export function getConfigSummary(config: AppConfig): Record<string, unknown> {
  return {
    environment: config.env,
    port: config.server.port,
    origins: config.server.allowedOrigins.length,
    database: config.database.path,
    sessionSecret: config.session.secretConfigured ? "configured" : "ephemeral",
    sessionTtlSeconds: config.session.ttlSeconds,
    rateLimit: config.rateLimit,
    csrf: config.csrf,
    cache: { mode: config.cache.url ? "shared" : "in-process", timeoutMs: config.cache.timeoutMs },
    logLevel: config.logging.level,
  };
}
