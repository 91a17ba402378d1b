/**
 * Response hardening headers
 *
 * Every response is JSON, so nothing may load, embed or frame it, and nothing
 * is cached: bodies carry session tokens, CSRF tokens and account data.
 */

import type { MiddlewareHandler } from "hono";

const CONTENT_SECURITY_POLICY = ["default-src", "frame-ancestors", "base-uri", "form-action"]
  .map((directive) => `${directive} 'none'`)
  .join("; ");

const PERMISSIONS_POLICY = ["camera", "geolocation", "microphone", "payment"]
  .map((feature) => `${feature}=()`)
  .join(", ");

// One year; set only when the service is reached over TLS
const HSTS = "max-age=31536000; includeSubDomains";

export function apiSecurityHeaders(isProduction: boolean): Record<string, string> {
  return {
    "Content-Security-Policy": CONTENT_SECURITY_POLICY,
    "X-Content-Type-Options": "nosniff",
    "X-Frame-Options": "DENY",
    "Referrer-Policy": "no-referrer",
    "Cache-Control": "no-store",
    "Permissions-Policy": PERMISSIONS_POLICY,
    ...(isProduction ? { "Strict-Transport-Security": HSTS } : {}),
  };
}

export function securityHeaders(options: { isProduction?: boolean } = {}): MiddlewareHandler {
  const headers = Object.entries(apiSecurityHeaders(options.isProduction ?? false));

  return async (c, next) => {
    await next();
    for (const [name, value] of headers) {
      c.header(name, value);
    }
  };
}
