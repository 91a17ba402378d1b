/**
 * CSRF Guard
 *
 * Double-submit tokens bound to the session: the expected token is an HMAC
 * of the session token, so nothing is stored server-side and a token lifted
 * from one session is useless with another.
 *
 * Only state-changing requests that carry a session token are checked.
 * API keys are never sent implicitly by a browser, so they are exempt.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import type { Context, Next } from "hono";
import { createLogger } from "../logging";
import { CsrfRejectedError } from "./errors";
import { classifyCredential } from "./identity";
import { extractCredential } from "./middleware";

const log = createLogger("csrf");

export const CSRF_HEADER = "X-CSRF-Token";
export const CSRF_FIELD = "csrf_token";
export const CSRF_COOKIE = "csrf_token";

const UNSAFE_METHODS = new Set(["POST", "PUT", "PATCH", "DELETE"]);

export function csrfTokenFor(secret: string, sessionToken: string): string {
  return createHmac("sha256", secret).update(`csrf:${sessionToken}`).digest("base64url");
}

export function csrfTokensMatch(expected: string, presented: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(presented);
  return a.length === b.length && timingSafeEqual(a, b);
}

export interface CsrfGuardOptions {
  secret: string;
  enabled: boolean;
  exemptPaths: readonly string[];
}

function isFormRequest(c: Context): boolean {
  const contentType = c.req.header("Content-Type") ?? "";
  return (
    contentType.startsWith("application/x-www-form-urlencoded") || contentType.startsWith("multipart/form-data")
  );
}

async function presentedToken(c: Context): Promise<string | null> {
  const header = c.req.header(CSRF_HEADER);
  if (header) return header;

  if (isFormRequest(c)) {
    const body = await c.req.parseBody();
    const field = body[CSRF_FIELD];
    if (typeof field === "string" && field.length > 0) return field;
  }
  return null;
}

export function csrfGuard(options: CsrfGuardOptions) {
  const exempt = new Set(options.exemptPaths);

  return async (c: Context, next: Next) => {
    if (!options.enabled || !UNSAFE_METHODS.has(c.req.method) || exempt.has(c.req.path)) {
      return next();
    }

    const credential = extractCredential(c);
    if (!credential || classifyCredential(credential.value) !== "session") {
      return next();
    }

    const presented = await presentedToken(c);
    if (!presented) {
      log.warn("CSRF token missing", { method: c.req.method, path: c.req.path });
      throw new CsrfRejectedError("missing");
    }
    if (!csrfTokensMatch(csrfTokenFor(options.secret, credential.value), presented)) {
      log.warn("CSRF token mismatch", { method: c.req.method, path: c.req.path });
      throw new CsrfRejectedError("mismatch");
    }

    return next();
  };
}
