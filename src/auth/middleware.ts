/**
 * Authentication Middleware for Hono
 *
 * Finds the request's credential, resolves it to a Principal and stores it
 * on the context. Every resolution failure becomes the same 401.
 */

import type { Context, Next } from "hono";
import { getCookie } from "hono/cookie";
import { UnauthenticatedError } from "./errors";
import type { IdentityResolver } from "./identity";
import type { Principal } from "./principal";

// Extend Hono context with the resolved identity
declare module "hono" {
  interface ContextVariableMap {
    principal: Principal | null;
  }
}

/** Cookie carrying the session token for browser clients */
export const ACCESS_TOKEN_COOKIE = "access_token";
export const API_KEY_HEADER = "X-API-Key";

export interface ExtractedCredential {
  value: string;
  transport: "bearer" | "api_key_header" | "cookie";
}

/**
 * Extract Bearer token from Authorization header
 */
function extractBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const match = header.match(/^Bearer\s+(.+)$/i);
  return match?.[1]?.trim() || null;
}

/**
 * First credential found, in order: Authorization Bearer, X-API-Key, cookie
 */
export function extractCredential(c: Context): ExtractedCredential | null {
  const bearer = extractBearerToken(c.req.header("Authorization"));
  if (bearer) return { value: bearer, transport: "bearer" };

  const apiKey = c.req.header(API_KEY_HEADER)?.trim();
  if (apiKey) return { value: apiKey, transport: "api_key_header" };

  const cookie = getCookie(c, ACCESS_TOKEN_COOKIE);
  if (cookie) return { value: cookie, transport: "cookie" };

  return null;
}

/**
 * Authentication middleware that requires a valid credential.
 *
 * @throws UnauthenticatedError when the credential is missing or does not resolve
 */
export function requireAuth(resolver: IdentityResolver) {
  return async (c: Context, next: Next) => {
    const result = await resolver.resolve(extractCredential(c)?.value);
    if (!result.ok) {
      throw new UnauthenticatedError();
    }

    c.set("principal", result.principal);
    await next();
  };
}

/**
 * Optional authentication middleware.
 * Sets the principal when a credential resolves, otherwise null.
 */
export function optionalAuth(resolver: IdentityResolver) {
  return async (c: Context, next: Next) => {
    const credential = extractCredential(c);
    const result = credential ? await resolver.resolve(credential.value) : null;
    c.set("principal", result?.ok ? result.principal : null);
    await next();
  };
}

/**
 * Principal set by requireAuth()
 *
 * @throws UnauthenticatedError when the route was not behind requireAuth()
 */
export function getPrincipal(c: Context): Principal {
  const principal = c.get("principal") ?? null;
  if (!principal) {
    throw new UnauthenticatedError();
  }
  return principal;
}
