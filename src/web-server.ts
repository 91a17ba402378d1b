/**
 * HTTP application: middleware chain, health check and route mounting
 */

import { Hono, type Context } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { CSRF_HEADER, csrfGuard } from "./auth/csrf";
import { API_KEY_HEADER } from "./auth/middleware";
import type { AuthServices } from "./auth/token-service";
import type { AppConfig } from "./config";
import { createLogger } from "./logging";
import type { RateLimiter } from "./rate-limit";
import type { Storage } from "./storage/types";
import type { ProxyTrust } from "./utils/ip-trust";
import { bodyLimit } from "./api/body-limit";
import { createHealthCheck } from "./api/health";
import { errorHandler, notFoundHandler } from "./api/middleware";
import { rateLimit } from "./api/rate-limiter";
import { REQUEST_ID_HEADER, requestContext } from "./api/request-context";
import { securityHeaders } from "./api/security-headers";
import { shutdownMiddleware } from "./api/shutdown";
import { adminRoutes } from "./api/routes/admin";
import { apiKeyRoutes } from "./api/routes/api-keys";
import { authRoutes } from "./api/routes/auth";
import { boardRoutes } from "./api/routes/boards";
import type { RouteDeps } from "./api/routes/deps";
import { docsRoutes } from "./api/routes/docs";
import { groupRoutes } from "./api/routes/groups";

const log = createLogger("web");

// Oversized Origin headers are refused outright
const MAX_ORIGIN_LENGTH = 256;

export const HEALTH_PATH = "/api/health";

export interface AppOptions {
  config: Pick<AppConfig, "isProduction" | "server" | "session" | "csrf">;
  storage: Storage;
  auth: AuthServices;
  limiter: RateLimiter;
  proxyTrust: ProxyTrust;
  /** Directly connected peer; the Node socket unless overridden */
  clientAddress?: (c: Context) => string | undefined;
  version?: string;
}

/**
 * Localhost check by URL parsing rather than a pattern
 */
function isLocalhostOrigin(origin: string): boolean {
  try {
    const url = new URL(origin);
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      return false;
    }
    return url.hostname === "localhost" || url.hostname === "127.0.0.1";
  } catch {
    return false;
  }
}

export function createApp(options: AppOptions): Hono {
  const { config, storage, auth, limiter } = options;
  const allowedOrigins = config.server.allowedOrigins;
  const app = new Hono();

  // Request context first, so every later log line carries the request id
  app.use("*", requestContext());
  app.use("*", shutdownMiddleware());

  app.use(
    "*",
    cors({
      origin: (origin) => {
        if (!origin) return null;
        if (origin.length > MAX_ORIGIN_LENGTH) {
          log.warn("Rejected oversized origin", { length: origin.length });
          return null;
        }
        if (allowedOrigins.includes(origin)) {
          return origin;
        }
        if (!config.isProduction && isLocalhostOrigin(origin)) {
          return origin;
        }
        return null;
      },
      allowMethods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
      allowHeaders: ["Content-Type", "Authorization", CSRF_HEADER, API_KEY_HEADER, REQUEST_ID_HEADER],
      exposeHeaders: [
        "X-RateLimit-Limit",
        "X-RateLimit-Remaining",
        "X-RateLimit-Reset",
        "Retry-After",
        REQUEST_ID_HEADER,
      ],
      credentials: true,
      maxAge: 86400,
    })
  );

  app.use("*", logger((line) => log.debug(line)));
  app.use("*", securityHeaders({ isProduction: config.isProduction }));

  app.use("/api/*", bodyLimit());
  app.use(
    "/api/*",
    csrfGuard({ secret: config.session.secret, enabled: config.csrf.enabled, exemptPaths: config.csrf.exemptPaths })
  );
  app.use(
    "/api/*",
    rateLimit({
      limiter,
      proxyTrust: options.proxyTrust,
      sessions: auth.sessions,
      apiKeys: auth.apiKeys,
      exemptPaths: [HEALTH_PATH],
      clientAddress: options.clientAddress,
    })
  );

  const healthCheck = createHealthCheck({
    pingDatabase: () => storage.ping(),
    rateLimiter: () => limiter.describe(),
    version: options.version,
  });

  app.get(HEALTH_PATH, async (c) => {
    const health = await healthCheck();
    return c.json(health, health.status === "unhealthy" ? 503 : 200);
  });

  const deps: RouteDeps = {
    storage,
    auth,
    session: {
      secret: config.session.secret,
      ttlSeconds: config.session.ttlSeconds,
      secureCookies: config.isProduction,
    },
  };

  app.route("/api/auth", authRoutes(deps));
  app.route("/api/api-keys", apiKeyRoutes(deps));
  app.route("/api/groups", groupRoutes(deps));
  app.route("/api/boards", boardRoutes(deps));
  app.route("/api/admin", adminRoutes(deps));
  app.route("/api/docs", docsRoutes(deps));

  app.onError(errorHandler);
  app.notFound(notFoundHandler);

  return app;
}
