/**
 * HTTP API Rate Limiter
 *
 * Keys each request on the authenticated user when its credential checks
 * out (a session token by signature alone, an API key by its hash),
 * otherwise on the client IP, and counts it against a sliding window.
 */

import { getConnInfo } from "@hono/node-server/conninfo";
import type { Context, Next } from "hono";
import type { ApiKeyService } from "../auth/api-keys";
import { RateLimitedError } from "../auth/errors";
import { classifyCredential } from "../auth/identity";
import { extractCredential } from "../auth/middleware";
import type { SessionTokenService } from "../auth/session-token";
import { createLogger } from "../logging";
import type { RateLimiter } from "../rate-limit";
import type { ProxyTrust } from "../utils/ip-trust";

const log = createLogger("rate-limiter");

export const DEFAULT_EXEMPT_PATHS = ["/api/health"];

export interface RateLimitMiddlewareOptions {
  limiter: RateLimiter;
  proxyTrust: ProxyTrust;
  sessions: Pick<SessionTokenService, "verify">;
  apiKeys: Pick<ApiKeyService, "ownerOf">;
  exemptPaths?: readonly string[];
  /** Address of the directly connected peer; defaults to the Node socket */
  clientAddress?: (c: Context) => string | undefined;
}

/**
 * Peer address from the Node adapter; absent when the app is driven
 * in-process through app.request()
 */
function socketAddress(c: Context): string | undefined {
  if (!c.env || !("incoming" in c.env)) return undefined;
  return getConnInfo(c).remote.address;
}

async function authenticatedUserId(
  c: Context,
  options: Pick<RateLimitMiddlewareOptions, "sessions" | "apiKeys">
): Promise<string | null> {
  const credential = extractCredential(c);
  if (!credential) return null;

  switch (classifyCredential(credential.value)) {
    case "api_key":
      return options.apiKeys.ownerOf(credential.value);
    case "session": {
      const payload = await options.sessions.verify(credential.value);
      return payload?.sub ?? null;
    }
    case "malformed":
      return null;
  }
}

/**
 * `user:<id>` for a verified session token or live API key, otherwise
 * `ip:<client ip>`
 */
export async function resolveClientKey(
  c: Context,
  options: Pick<RateLimitMiddlewareOptions, "proxyTrust" | "sessions" | "apiKeys" | "clientAddress">
): Promise<string> {
  const userId = await authenticatedUserId(c, options);
  if (userId) return `user:${userId}`;

  const direct = (options.clientAddress ?? socketAddress)(c);
  const ip = options.proxyTrust.getClientIP(direct, c.req.header("X-Forwarded-For"), c.req.header("X-Real-IP"));
  return `ip:${ip}`;
}

/**
 * Create a rate limiting middleware
 *
 * @throws RateLimitedError when the client's window is full
 */
export function rateLimit(options: RateLimitMiddlewareOptions) {
  const exempt = new Set(options.exemptPaths ?? DEFAULT_EXEMPT_PATHS);

  return async (c: Context, next: Next) => {
    if (exempt.has(c.req.path)) {
      return next();
    }

    const clientKey = await resolveClientKey(c, options);
    const result = await options.limiter.check(clientKey);

    c.header("X-RateLimit-Limit", String(result.limit));
    c.header("X-RateLimit-Remaining", String(result.remaining));
    c.header("X-RateLimit-Reset", String(Math.ceil(result.resetAt / 1000)));

    if (!result.allowed) {
      log.info("Rate limit exceeded", {
        clientKey,
        path: c.req.path,
        retryAfterSeconds: result.retryAfterSeconds,
      });
      throw new RateLimitedError(result.retryAfterSeconds);
    }

    await next();
  };
}
