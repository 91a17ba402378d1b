/**
 * JWT Token Utilities
 *
 * HS256 tokens signed and verified through Web Crypto. The signing secret
 * and clock are passed in, so verification is a pure function of its inputs.
 *
 * Checks run cheapest first: size, shape, algorithm, then the signature.
 * Claims are only trusted after the signature verifies.
 */

import { webcrypto } from "node:crypto";
import { z } from "zod";

/**
 * Maximum token size in bytes (8KB)
 * A session token with the fixed claim set is ~250 bytes.
 */
export const MAX_TOKEN_SIZE = 8 * 1024;

export const TOKEN_ISSUER = "kanban";

/** Supported JWT algorithm (only HS256) */
const SUPPORTED_ALGORITHM = "HS256";

const SEGMENT = /^[A-Za-z0-9_-]+$/;

const headerSchema = z.object({ alg: z.string(), typ: z.string().optional() });

const payloadSchema = z.object({
  sub: z.string().min(1),
  iss: z.string(),
  iat: z.number().int(),
  exp: z.number().int(),
  jti: z.string().min(1),
});

export type JWTPayload = z.infer<typeof payloadSchema>;

export type JWTFailure = "malformed" | "invalid_signature" | "expired";

export type TokenValidationResult =
  | { valid: true; payload: JWTPayload }
  | { valid: false; reason: JWTFailure; error: string };

export interface JWTOptions {
  secret: string;
  /** Milliseconds since the epoch; defaults to Date.now */
  now?: () => number;
}

function base64UrlEncode(data: Uint8Array | ArrayBuffer): string {
  return Buffer.from(data instanceof ArrayBuffer ? new Uint8Array(data) : data).toString("base64url");
}

function base64UrlDecode(str: string): Buffer {
  return Buffer.from(str, "base64url");
}

function parseJson(segment: string): unknown {
  return JSON.parse(base64UrlDecode(segment).toString("utf8"));
}

async function getSigningKey(secret: string): Promise<webcrypto.CryptoKey> {
  return webcrypto.subtle.importKey(
    "raw",
    new TextEncoder().encode(secret),
    { name: "HMAC", hash: "SHA-256" },
    false,
    ["sign", "verify"]
  );
}

function nowSeconds(options: JWTOptions): number {
  return Math.floor((options.now ?? Date.now)() / 1000);
}

function fail(reason: JWTFailure, error: string): TokenValidationResult {
  return { valid: false, reason, error };
}

/**
 * Sign a JWT token
 *
 * @param claims - Subject and token id
 * @param options.expiresInSeconds - Token lifetime
 */
export async function signJWT(
  claims: { sub: string; jti: string },
  options: JWTOptions & { expiresInSeconds: number }
): Promise<{ token: string; payload: JWTPayload }> {
  const iat = nowSeconds(options);
  const payload: JWTPayload = {
    sub: claims.sub,
    iss: TOKEN_ISSUER,
    iat,
    exp: iat + options.expiresInSeconds,
    jti: claims.jti,
  };

  const encoder = new TextEncoder();
  const headerB64 = base64UrlEncode(encoder.encode(JSON.stringify({ alg: SUPPORTED_ALGORITHM, typ: "JWT" })));
  const payloadB64 = base64UrlEncode(encoder.encode(JSON.stringify(payload)));

  const key = await getSigningKey(options.secret);
  const signature = await webcrypto.subtle.sign("HMAC", key, encoder.encode(`${headerB64}.${payloadB64}`));

  return { token: `${headerB64}.${payloadB64}.${base64UrlEncode(signature)}`, payload };
}

/**
 * Verify and decode a JWT token
 *
 * Expiry is exclusive: a token is rejected from the second named by `exp`.
 */
export async function verifyJWT(token: string, options: JWTOptions): Promise<TokenValidationResult> {
  if (token.length > MAX_TOKEN_SIZE) {
    return fail("malformed", "Token too large");
  }

  const [headerB64, payloadB64, signatureB64, ...rest] = token.split(".");
  if (!headerB64 || !payloadB64 || !signatureB64 || rest.length > 0) {
    return fail("malformed", "Invalid token format");
  }
  if (!SEGMENT.test(headerB64) || !SEGMENT.test(payloadB64) || !SEGMENT.test(signatureB64)) {
    return fail("malformed", "Invalid token encoding");
  }

  let header: z.infer<typeof headerSchema>;
  try {
    const parsed = headerSchema.safeParse(parseJson(headerB64));
    if (!parsed.success) {
      return fail("malformed", "Invalid token header");
    }
    header = parsed.data;
  } catch {
    return fail("malformed", "Invalid token header");
  }

  // Rejects "none" and anything that could confuse the verifier
  if (header.alg !== SUPPORTED_ALGORITHM) {
    return fail("malformed", "Unsupported algorithm");
  }

  const key = await getSigningKey(options.secret);
  const valid = await webcrypto.subtle.verify(
    "HMAC",
    key,
    base64UrlDecode(signatureB64),
    new TextEncoder().encode(`${headerB64}.${payloadB64}`)
  );
  if (!valid) {
    return fail("invalid_signature", "Invalid signature");
  }

  let payload: JWTPayload;
  try {
    const parsed = payloadSchema.safeParse(parseJson(payloadB64));
    if (!parsed.success) {
      return fail("malformed", "Invalid token claims");
    }
    payload = parsed.data;
  } catch {
    return fail("malformed", "Invalid token claims");
  }

  if (payload.iss !== TOKEN_ISSUER) {
    return fail("invalid_signature", "Invalid issuer");
  }

  const now = nowSeconds(options);
  if (now >= payload.exp) {
    return fail("expired", "Token expired");
  }
  if (payload.iat > now) {
    return fail("expired", "Token not yet valid");
  }

  return { valid: true, payload };
}
