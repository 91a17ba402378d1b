/**
 * JWT Token Tests
 */

import { describe, it, expect } from "vitest";
import { MAX_TOKEN_SIZE, TOKEN_ISSUER, signJWT, verifyJWT } from "./jwt";

const SECRET = "test-secret-test-secret-test-secret";
const T0 = Date.UTC(2026, 0, 1);

function encodeSegment(value: unknown): string {
  return Buffer.from(JSON.stringify(value)).toString("base64url");
}

describe("JWT", () => {
  describe("signJWT", () => {
    it("creates a three-segment token", async () => {
      const { token } = await signJWT({ sub: "user-123", jti: "j1" }, { secret: SECRET, expiresInSeconds: 60 });

      expect(token.split(".")).toHaveLength(3);
    });

    it("fills the standard claims from the clock", async () => {
      const { payload } = await signJWT(
        { sub: "user-123", jti: "j1" },
        { secret: SECRET, expiresInSeconds: 60, now: () => T0 }
      );

      expect(payload).toEqual({
        sub: "user-123",
        iss: TOKEN_ISSUER,
        iat: T0 / 1000,
        exp: T0 / 1000 + 60,
        jti: "j1",
      });
    });
  });

  describe("verifyJWT", () => {
    it("round-trips the payload", async () => {
      const signed = await signJWT({ sub: "user-123", jti: "j1" }, { secret: SECRET, expiresInSeconds: 60 });
      const result = await verifyJWT(signed.token, { secret: SECRET });

      expect(result).toEqual({ valid: true, payload: signed.payload });
    });

    it("rejects tokens with invalid signature", async () => {
      const { token } = await signJWT({ sub: "user-123", jti: "j1" }, { secret: SECRET, expiresInSeconds: 60 });
      const tampered = token.slice(0, -5) + "XXXXX";

      const result = await verifyJWT(tampered, { secret: SECRET });

      expect(result.valid).toBe(false);
      expect(!result.valid && result.reason).toBe("invalid_signature");
    });

    it("rejects tokens signed with another secret", async () => {
      const { token } = await signJWT(
        { sub: "user-123", jti: "j1" },
        { secret: "another-secret-another-secret-xyz", expiresInSeconds: 60 }
      );

      const result = await verifyJWT(token, { secret: SECRET });

      expect(!result.valid && result.reason).toBe("invalid_signature");
    });

    it("accepts a token one second before exp and rejects it at exp", async () => {
      const { token } = await signJWT(
        { sub: "user-123", jti: "j1" },
        { secret: SECRET, expiresInSeconds: 60, now: () => T0 }
      );

      const before = await verifyJWT(token, { secret: SECRET, now: () => T0 + 59_999 });
      const atExp = await verifyJWT(token, { secret: SECRET, now: () => T0 + 60_000 });

      expect(before.valid).toBe(true);
      expect(atExp).toEqual({ valid: false, reason: "expired", error: "Token expired" });
    });

    it("rejects tokens issued in the future", async () => {
      const { token } = await signJWT(
        { sub: "user-123", jti: "j1" },
        { secret: SECRET, expiresInSeconds: 60, now: () => T0 + 10_000 }
      );

      const result = await verifyJWT(token, { secret: SECRET, now: () => T0 });

      expect(!result.valid && result.error).toBe("Token not yet valid");
    });

    it("rejects malformed tokens", async () => {
      const result = await verifyJWT("not-a-valid-token", { secret: SECRET });

      expect(result).toEqual({ valid: false, reason: "malformed", error: "Invalid token format" });
    });

    it("rejects tokens with four segments", async () => {
      const result = await verifyJWT("a.b.c.d", { secret: SECRET });

      expect(!result.valid && result.reason).toBe("malformed");
    });

    it("rejects oversized tokens before parsing", async () => {
      const huge = "a".repeat(MAX_TOKEN_SIZE + 1);

      const result = await verifyJWT(huge, { secret: SECRET });

      expect(!result.valid && result.error).toBe("Token too large");
    });

    it("rejects the none algorithm", async () => {
      const header = encodeSegment({ alg: "none", typ: "JWT" });
      const payload = encodeSegment({ sub: "admin", iss: TOKEN_ISSUER, iat: 0, exp: 9_999_999_999, jti: "x" });

      const result = await verifyJWT(`${header}.${payload}.c2ln`, { secret: SECRET });

      expect(!result.valid && result.error).toBe("Unsupported algorithm");
    });

    it("rejects headers that are not JSON", async () => {
      const result = await verifyJWT("bm90anNvbg.e30.c2ln", { secret: SECRET });

      expect(!result.valid && result.error).toBe("Invalid token header");
    });
  });
});
