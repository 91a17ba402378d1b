/**
 * Process entry point
 */

import { serve } from "@hono/node-server";
import { installShutdownHandlers, onShutdown } from "./api";
import { createAuthServices } from "./auth";
import { GuardedCache, createRedisCache } from "./cache";
import { ConfigurationError, getConfigSummary, loadConfig, type AppConfig } from "./config";
import { createLogger } from "./logging";
import { RateLimiter, createRateLimitStore } from "./rate-limit";
import { createStorage, openDatabase } from "./storage";
import { createProxyTrust } from "./utils";
import { createApp } from "./web-server";

const log = createLogger("main");

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigurationError) {
      log.error("Refusing to start", { error: err });
      process.exit(1);
    }
    throw err;
  }
}

const config = readConfig();
log.info("Configuration loaded", getConfigSummary(config));

const storage = createStorage(openDatabase(config.database.path, { busyTimeoutMs: config.database.busyTimeoutMs }));

const sharedCache = config.cache.url ? createRedisCache(config.cache.url) : null;
const cache = sharedCache ? new GuardedCache(sharedCache, { timeoutMs: config.cache.timeoutMs }) : null;

const auth = createAuthServices({
  storage,
  secret: config.session.secret,
  sessionTtlSeconds: config.session.ttlSeconds,
  bcryptRounds: config.passwords.bcryptRounds,
  authTimeoutMs: config.timeouts.authMs,
  cache,
});

const limiter = new RateLimiter(createRateLimitStore(cache), {
  name: "api",
  maxRequests: config.rateLimit.maxRequests,
  windowMs: config.rateLimit.windowMs,
});

const app = createApp({
  config,
  storage,
  auth,
  limiter,
  proxyTrust: createProxyTrust(config.network.trustedProxyCidrs),
  version: process.env.npm_package_version,
});

const server = serve({ fetch: app.fetch, port: config.server.port }, (info) => {
  log.info("Server started", { port: info.port, rateLimitMode: limiter.describe().mode });
});

onShutdown("http-server", () => {
  return new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
});
onShutdown("rate-limiter", () => limiter.close());
onShutdown("shared-cache", async () => {
  if (sharedCache) await sharedCache.close();
});
onShutdown("database", () => storage.close());

installShutdownHandlers();
