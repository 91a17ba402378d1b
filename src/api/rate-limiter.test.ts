/**
 * Rate Limiting Middleware Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { Hono } from "hono";
import { RateLimiter, MemoryRateLimitStore } from "../rate-limit";
import type { Storage, UserRecord } from "../storage/types";
import { createTestAuth, createTestStorage, createTestUser } from "../testing/fixtures";
import type { AuthServices } from "../auth/token-service";
import { createProxyTrust } from "../utils/ip-trust";
import { errorHandler } from "./middleware";
import { rateLimit, resolveClientKey } from "./rate-limiter";

const T0 = 1_700_000_000_000;

describe("rate limiting middleware", () => {
  let storage: Storage;
  let auth: AuthServices;
  let alice: UserRecord;
  let limiter: RateLimiter;
  let peer: string;

  function createApp(): Hono {
    const keying = {
      proxyTrust: createProxyTrust(["10.0.0.0/8"]),
      sessions: auth.sessions,
      apiKeys: auth.apiKeys,
      clientAddress: () => peer,
    };
    const app = new Hono();
    app.use("*", rateLimit({ limiter, ...keying }));
    app.get("/api/health", (c) => c.json({ ok: true }));
    app.get("/key", async (c) => c.json({ key: await resolveClientKey(c, keying) }));
    app.onError(errorHandler);
    return app;
  }

  beforeEach(async () => {
    storage = createTestStorage();
    auth = createTestAuth(storage);
    alice = await createTestUser(storage, "alice");
    limiter = new RateLimiter(
      new MemoryRateLimitStore({ now: () => T0 }),
      { name: "api", maxRequests: 2, windowMs: 60_000 },
      () => T0
    );
    peer = "198.51.100.7";
  });

  afterEach(async () => {
    await limiter.close();
    storage.close();
  });

  describe("resolveClientKey", () => {
    it("keys anonymous requests on the peer address", async () => {
      const res = await createApp().request("/key");

      expect(await res.json()).toEqual({ key: "ip:198.51.100.7" });
    });

    it("trusts X-Forwarded-For only from a trusted proxy", async () => {
      const headers = { "X-Forwarded-For": "203.0.113.5" };

      const direct = await createApp().request("/key", { headers });
      peer = "10.1.2.3";
      const proxied = await createApp().request("/key", { headers });

      expect(await direct.json()).toEqual({ key: "ip:198.51.100.7" });
      expect(await proxied.json()).toEqual({ key: "ip:203.0.113.5" });
    });

    it("keys a verified session token on the user", async () => {
      const { token } = await auth.sessions.issue(alice);

      const res = await createApp().request("/key", { headers: { Authorization: `Bearer ${token}` } });

      expect(await res.json()).toEqual({ key: `user:${alice.id}` });
    });

    it("keys a live API key on its owner, whichever header carries it", async () => {
      const { apiKey } = await auth.apiKeys.issue(alice, { name: "ci" });

      const header = await createApp().request("/key", { headers: { "X-API-Key": apiKey } });
      const bearer = await createApp().request("/key", { headers: { Authorization: `Bearer ${apiKey}` } });

      expect(await header.json()).toEqual({ key: `user:${alice.id}` });
      expect(await bearer.json()).toEqual({ key: `user:${alice.id}` });
    });

    it("falls back to the address for a forged token, an unknown key or a revoked key", async () => {
      const { apiKey, key } = await auth.apiKeys.issue(alice, { name: "ci" });
      await storage.apiKeys.update(key.id, { isActive: false });

      const forged = await createApp().request("/key", { headers: { Authorization: "Bearer not.a.token" } });
      const unknown = await createApp().request("/key", { headers: { "X-API-Key": "sk_anything" } });
      const revoked = await createApp().request("/key", { headers: { "X-API-Key": apiKey } });

      expect(await forged.json()).toEqual({ key: "ip:198.51.100.7" });
      expect(await unknown.json()).toEqual({ key: "ip:198.51.100.7" });
      expect(await revoked.json()).toEqual({ key: "ip:198.51.100.7" });
    });
  });

  it("sets rate limit headers and throttles past the limit", async () => {
    const app = createApp();

    const first = await app.request("/key");
    await app.request("/key");
    const third = await app.request("/key");

    expect(first.headers.get("X-RateLimit-Remaining")).toBe("1");
    expect(third.status).toBe(429);
    expect(third.headers.get("Retry-After")).toBe("60");
  });

  it("counts users apart from their shared address", async () => {
    const app = createApp();
    const { token } = await auth.sessions.issue(alice);
    await app.request("/key");
    await app.request("/key");

    const res = await app.request("/key", { headers: { Authorization: `Bearer ${token}` } });

    expect(res.status).toBe(200);
  });

  it("gives each key holder their own budget, wherever their requests come from", async () => {
    const app = createApp();
    const bob = await createTestUser(storage, "bob");
    const { apiKey: aliceKey } = await auth.apiKeys.issue(alice, { name: "ci" });
    const { apiKey: bobKey } = await auth.apiKeys.issue(bob, { name: "ci" });
    const send = (apiKey: string) => app.request("/key", { headers: { "X-API-Key": apiKey } });

    const statuses = [(await send(aliceKey)).status, (await send(aliceKey)).status, (await send(bobKey)).status];
    peer = "192.0.2.44";
    statuses.push((await send(aliceKey)).status);

    expect(statuses).toEqual([200, 200, 200, 429]);
  });

  it("skips exempt paths", async () => {
    const app = createApp();
    for (let i = 0; i < 3; i++) {
      await app.request("/api/health");
    }

    const res = await app.request("/api/health");

    expect(res.status).toBe(200);
    expect(res.headers.get("X-RateLimit-Limit")).toBeNull();
  });
});
