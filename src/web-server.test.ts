/**
 * End-to-end tests for the assembled application
 *
 * Drives the full middleware chain in-process through app.request().
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { Hono } from "hono";
import { z } from "zod";
import type { AuthServices } from "./auth/token-service";
import { GuardedCache } from "./cache/guarded";
import { RateLimiter, createRateLimitStore } from "./rate-limit";
import type { Storage } from "./storage/types";
import { FakeSharedCache } from "./testing/fake-cache";
import { TEST_SECRET, createTestAuth, createTestStorage, createTestUser } from "./testing/fixtures";
import { createProxyTrust } from "./utils/ip-trust";
import { createApp } from "./web-server";

const T0 = 1_700_000_000_000;
const PASSWORD = "correct-horse-battery";

const loginReply = z.object({
  token: z.string(),
  csrfToken: z.string(),
  user: z.object({ id: z.string() }),
});
const idReply = z.object({ id: z.string() });
const keyReply = z.object({ apiKey: z.string(), keyInfo: z.object({ id: z.string() }) });

interface Session {
  userId: string;
  token: string;
  csrfToken: string;
}

interface Harness {
  app: Hono;
  storage: Storage;
  auth: AuthServices;
  limiter: RateLimiter;
}

function createHarness(options: { maxRequests?: number; cache?: GuardedCache | null } = {}): Harness {
  const now = () => T0;
  const storage = createTestStorage();
  const auth = createTestAuth(storage, { cache: options.cache ?? null });
  const limiter = new RateLimiter(
    createRateLimitStore(options.cache ?? null, { now }),
    { name: "api", maxRequests: options.maxRequests ?? 1_000, windowMs: 60_000 },
    now
  );

  const app = createApp({
    config: {
      isProduction: false,
      server: { port: 0, allowedOrigins: ["https://kanban.example"] },
      session: { secret: TEST_SECRET, secretConfigured: true, ttlSeconds: 3_600 },
      csrf: { enabled: true, exemptPaths: ["/api/auth/login", "/api/auth/register"] },
    },
    storage,
    auth,
    limiter,
    proxyTrust: createProxyTrust(),
    clientAddress: () => "203.0.113.9",
  });

  return { app, storage, auth, limiter };
}

function json(method: string, body: unknown, headers: Record<string, string> = {}): RequestInit {
  return { method, headers: { "Content-Type": "application/json", ...headers }, body: JSON.stringify(body) };
}

function asSession(session: Session): Record<string, string> {
  return { Authorization: `Bearer ${session.token}`, "X-CSRF-Token": session.csrfToken };
}

describe("Web server", () => {
  let h: Harness;

  async function register(username: string): Promise<string> {
    const res = await h.app.request(
      "/api/auth/register",
      json("POST", { username, email: `${username}@Example.com`, password: PASSWORD })
    );
    expect(res.status).toBe(201);
    return idReply.parse(await res.json()).id;
  }

  async function login(username: string): Promise<Session> {
    const res = await h.app.request("/api/auth/login", json("POST", { username, password: PASSWORD }));
    expect(res.status).toBe(200);
    const body = loginReply.parse(await res.json());
    return { userId: body.user.id, token: body.token, csrfToken: body.csrfToken };
  }

  async function signUp(username: string): Promise<Session> {
    await register(username);
    return login(username);
  }

  async function createGroup(owner: Session, name: string): Promise<string> {
    const res = await h.app.request("/api/groups", json("POST", { name }, asSession(owner)));
    expect(res.status).toBe(201);
    return idReply.parse(await res.json()).id;
  }

  beforeEach(() => {
    h = createHarness();
  });

  afterEach(async () => {
    await h.limiter.close();
    h.storage.close();
  });

  describe("accounts", () => {
    it("registers a user without exposing the password hash", async () => {
      const res = await h.app.request(
        "/api/auth/register",
        json("POST", { username: "alice", email: "Alice@Example.com", password: PASSWORD })
      );
      const body = await res.json();

      expect(res.status).toBe(201);
      expect(body).toMatchObject({ username: "alice", email: "alice@example.com", isAdmin: false, isActive: true });
      expect(body).not.toHaveProperty("passwordHash");
    });

    it("rejects a second registration of the same username", async () => {
      await register("alice");

      const res = await h.app.request(
        "/api/auth/register",
        json("POST", { username: "alice", email: "other@example.com", password: PASSWORD })
      );

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({
        error: { code: "ALREADY_EXISTS", message: "Username already registered" },
      });
    });

    it("sets the session and CSRF cookies on login", async () => {
      await register("alice");

      const res = await h.app.request("/api/auth/login", json("POST", { username: "alice", password: PASSWORD }));
      const cookies = res.headers.getSetCookie();
      const session = cookies.find((c) => c.startsWith("access_token="));
      const csrf = cookies.find((c) => c.startsWith("csrf_token="));

      expect(res.status).toBe(200);
      expect(session).toContain("HttpOnly");
      expect(csrf).toBeDefined();
      expect(csrf).not.toContain("HttpOnly");
    });

    it("answers an unknown user and a wrong password identically", async () => {
      await register("alice");

      const unknown = await h.app.request("/api/auth/login", json("POST", { username: "nobody", password: PASSWORD }));
      const wrong = await h.app.request(
        "/api/auth/login",
        json("POST", { username: "alice", password: "wrong-password" })
      );
      const expected = { error: { code: "UNAUTHENTICATED", message: "Invalid credentials" } };

      expect(unknown.status).toBe(401);
      expect(wrong.status).toBe(401);
      expect(await unknown.json()).toEqual(expected);
      expect(await wrong.json()).toEqual(expected);
    });

    it("accepts the session cookie with the CSRF cookie echoed in the header", async () => {
      const alice = await signUp("alice");

      const res = await h.app.request("/api/groups", {
        ...json("POST", { name: "Cookie group" }),
        headers: {
          "Content-Type": "application/json",
          Cookie: `access_token=${alice.token}; csrf_token=${alice.csrfToken}`,
          "X-CSRF-Token": alice.csrfToken,
        },
      });

      expect(res.status).toBe(201);
    });

    it("revokes the session token on logout", async () => {
      const alice = await signUp("alice");

      const logout = await h.app.request("/api/auth/logout", { method: "POST", headers: asSession(alice) });
      const me = await h.app.request("/api/auth/me", { headers: asSession(alice) });

      expect(logout.status).toBe(200);
      expect(await logout.json()).toEqual({ success: true, message: "Logged out" });
      expect(me.status).toBe(401);
    });

    it("requires the current password to change it", async () => {
      const alice = await signUp("alice");

      const res = await h.app.request(
        "/api/auth/change-password",
        json("POST", { currentPassword: "not-my-password", newPassword: "another-long-one" }, asSession(alice))
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { code: "INVALID_PASSWORD", message: "Current password is incorrect" },
      });
    });
  });

  describe("CSRF", () => {
    it("rejects a session request without a CSRF token with the CSRF code", async () => {
      const alice = await signUp("alice");

      const res = await h.app.request(
        "/api/groups",
        json("POST", { name: "Team" }, { Authorization: `Bearer ${alice.token}` })
      );

      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({ error: { code: "CSRF_REJECTED", message: "CSRF token missing" } });
    });

    it("does not ask API-key clients for a CSRF token", async () => {
      const alice = await signUp("alice");
      const created = await h.app.request(
        "/api/api-keys",
        json("POST", { name: "ci", scopes: ["read", "write"] }, asSession(alice))
      );
      const { apiKey } = keyReply.parse(await created.json());

      const res = await h.app.request("/api/groups", json("POST", { name: "Automation" }, { "X-API-Key": apiKey }));

      expect(res.status).toBe(201);
    });
  });

  describe("groups and boards", () => {
    it("lets a member write to a group board but not delete it", async () => {
      const alice = await signUp("alice");
      const bob = await signUp("bob");
      const groupId = await createGroup(alice, "Team");

      const added = await h.app.request(
        `/api/groups/${groupId}/members`,
        json("POST", { userId: bob.userId }, asSession(alice))
      );
      expect(added.status).toBe(201);

      const board = await h.app.request("/api/boards", json("POST", { name: "Roadmap", groupId }, asSession(alice)));
      const boardId = idReply.parse(await board.json()).id;

      const edit = await h.app.request(`/api/boards/${boardId}`, json("PATCH", { name: "Q3" }, asSession(bob)));
      const remove = await h.app.request(`/api/boards/${boardId}`, { method: "DELETE", headers: asSession(bob) });

      expect(edit.status).toBe(200);
      expect(await edit.json()).toMatchObject({ id: boardId, name: "Q3", groupId });
      expect(remove.status).toBe(403);
      expect(await remove.json()).toEqual({
        error: { code: "FORBIDDEN", message: `Access denied to board ${boardId}` },
      });
    });

    it("keeps a group from losing its last owner", async () => {
      const alice = await signUp("alice");
      const groupId = await createGroup(alice, "Solo");

      const res = await h.app.request(`/api/groups/${groupId}/members/${alice.userId}`, {
        method: "DELETE",
        headers: asSession(alice),
      });

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({
        error: { code: "LAST_OWNER", message: "A group must keep at least one owner" },
      });
    });

    it("stops a plain member from adding members", async () => {
      const alice = await signUp("alice");
      const bob = await signUp("bob");
      const carolId = await register("carol");
      const groupId = await createGroup(alice, "Team");
      await h.app.request(`/api/groups/${groupId}/members`, json("POST", { userId: bob.userId }, asSession(alice)));

      const res = await h.app.request(
        `/api/groups/${groupId}/members`,
        json("POST", { userId: carolId }, asSession(bob))
      );

      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({
        error: { code: "FORBIDDEN", message: `Access denied to group ${groupId}` },
      });
    });

    it("reports a duplicate membership as a conflict", async () => {
      const alice = await signUp("alice");
      const bobId = await register("bob");
      const groupId = await createGroup(alice, "Team");
      const add = () =>
        h.app.request(`/api/groups/${groupId}/members`, json("POST", { userId: bobId }, asSession(alice)));

      expect((await add()).status).toBe(201);
      const second = await add();

      expect(second.status).toBe(409);
      expect(await second.json()).toEqual({
        error: { code: "ALREADY_EXISTS", message: "User is already a member of this group" },
      });
    });

    it("hides other users' personal boards", async () => {
      const alice = await signUp("alice");
      const bob = await signUp("bob");
      const board = await h.app.request("/api/boards", json("POST", { name: "Private" }, asSession(alice)));
      const boardId = idReply.parse(await board.json()).id;

      const res = await h.app.request(`/api/boards/${boardId}`, { headers: asSession(bob) });

      expect(res.status).toBe(403);
    });

    it("rejects a malformed board id before touching the store", async () => {
      const alice = await signUp("alice");

      const res = await h.app.request("/api/boards/bad!id", { headers: asSession(alice) });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: { code: "INVALID_ID" } });
    });
  });

  describe("API keys", () => {
    it("caps a read-scoped key at reading, whatever its owner may do", async () => {
      const alice = await signUp("alice");
      const board = await h.app.request("/api/boards", json("POST", { name: "Mine" }, asSession(alice)));
      const boardId = idReply.parse(await board.json()).id;
      const created = await h.app.request("/api/api-keys", json("POST", { name: "reader", scopes: ["read"] }, asSession(alice)));
      const { apiKey } = keyReply.parse(await created.json());

      const read = await h.app.request(`/api/boards/${boardId}`, { headers: { "X-API-Key": apiKey } });
      const write = await h.app.request(`/api/boards/${boardId}`, json("PATCH", { name: "Renamed" }, { "X-API-Key": apiKey }));

      expect(read.status).toBe(200);
      expect(write.status).toBe(403);
      expect(await write.json()).toEqual({
        error: { code: "FORBIDDEN", message: `Access denied to board ${boardId}` },
      });
    });

    it("keeps a docs-only key out of group and key listings", async () => {
      const alice = await signUp("alice");
      await createGroup(alice, "Secret team");
      const created = await h.app.request("/api/api-keys", json("POST", { name: "docs", scopes: ["docs"] }, asSession(alice)));
      const { apiKey, keyInfo } = keyReply.parse(await created.json());
      const headers = { "X-API-Key": apiKey };

      const groups = await h.app.request("/api/groups", { headers });
      const keys = await h.app.request("/api/api-keys", { headers });
      const key = await h.app.request(`/api/api-keys/${keyInfo.id}`, { headers });
      const usage = await h.app.request("/api/api-keys/stats/usage", { headers });

      expect(groups.status).toBe(403);
      expect(await groups.json()).toEqual({ error: { code: "FORBIDDEN", message: "Access denied to group" } });
      expect([keys.status, key.status, usage.status]).toEqual([403, 403, 403]);
      expect(await keys.json()).toEqual({ error: { code: "FORBIDDEN", message: "Access denied to api_key" } });
    });

    it("lists groups for a read-scoped key", async () => {
      const alice = await signUp("alice");
      await createGroup(alice, "Team");
      const created = await h.app.request("/api/api-keys", json("POST", { name: "reader", scopes: ["read"] }, asSession(alice)));
      const { apiKey } = keyReply.parse(await created.json());

      const res = await h.app.request("/api/groups", { headers: { "X-API-Key": apiKey } });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ data: [{ name: "Team", role: "owner" }], total: 1 });
    });

    it("does not let a key mint other keys", async () => {
      const alice = await signUp("alice");
      const created = await h.app.request(
        "/api/api-keys",
        json("POST", { name: "writer", scopes: ["read", "write"] }, asSession(alice))
      );
      const { apiKey } = keyReply.parse(await created.json());

      const res = await h.app.request("/api/api-keys", json("POST", { name: "child" }, { "X-API-Key": apiKey }));

      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({ error: { code: "FORBIDDEN", message: "Access denied to api_key" } });
    });

    it("refuses the admin scope to a non-administrator", async () => {
      const alice = await signUp("alice");

      const res = await h.app.request("/api/api-keys", json("POST", { name: "root", scopes: ["admin"] }, asSession(alice)));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: {
          code: "INVALID_SCOPES",
          message: "Scopes not permitted for this account: admin",
          details: { scopes: ["admin"] },
        },
      });
    });

    it("stops accepting a revoked key", async () => {
      const alice = await signUp("alice");
      const created = await h.app.request("/api/api-keys", json("POST", { name: "temp", scopes: ["read"] }, asSession(alice)));
      const { apiKey, keyInfo } = keyReply.parse(await created.json());

      const revoke = await h.app.request(`/api/api-keys/${keyInfo.id}`, { method: "DELETE", headers: asSession(alice) });
      const after = await h.app.request("/api/api-keys", { headers: { "X-API-Key": apiKey } });

      expect(revoke.status).toBe(204);
      expect(after.status).toBe(401);
    });

    it("summarizes key usage", async () => {
      const alice = await signUp("alice");
      const created = await h.app.request("/api/api-keys", json("POST", { name: "stats", scopes: ["read"] }, asSession(alice)));
      const { apiKey } = keyReply.parse(await created.json());
      await h.app.request("/api/api-keys", { headers: { "X-API-Key": apiKey } });

      const res = await h.app.request("/api/api-keys/stats/usage", { headers: asSession(alice) });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        totalKeys: 1,
        activeKeys: 1,
        expiredKeys: 0,
        totalRequests: 1,
        keysUsedToday: 1,
        recentUsage: [{ keyName: "stats", usageCount: 1 }],
      });
    });
  });

  describe("administration", () => {
    async function signUpAdmin(): Promise<Session> {
      await createTestUser(h.storage, "root", {
        isAdmin: true,
        passwordHash: await h.auth.passwords.hash(PASSWORD),
      });
      return login("root");
    }

    it("pages through users", async () => {
      const root = await signUpAdmin();
      await register("alice");

      const res = await h.app.request("/api/admin/users?limit=1&offset=0", { headers: asSession(root) });

      const body = z.object({ data: z.array(z.unknown()), meta: z.unknown() }).parse(await res.json());

      expect(res.status).toBe(200);
      expect(body.data).toHaveLength(1);
      expect(body.meta).toEqual({ total: 2, page: 1, pageSize: 1, hasMore: true, offset: 0 });
    });

    it("keeps the system resource from ordinary users", async () => {
      const alice = await signUp("alice");

      const res = await h.app.request("/api/admin/users", { headers: asSession(alice) });

      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({ error: { code: "FORBIDDEN", message: "Access denied to system" } });
    });

    it("locks a deactivated user out of an existing session", async () => {
      const root = await signUpAdmin();
      const alice = await signUp("alice");

      const deactivate = await h.app.request(`/api/admin/users/${alice.userId}/deactivate`, {
        method: "PUT",
        headers: asSession(root),
      });
      const me = await h.app.request("/api/auth/me", { headers: asSession(alice) });

      expect(deactivate.status).toBe(200);
      expect(await deactivate.json()).toMatchObject({ id: alice.userId, isActive: false });
      expect(me.status).toBe(401);
    });

    it("refuses to deactivate the calling administrator", async () => {
      const root = await signUpAdmin();

      const res = await h.app.request(`/api/admin/users/${root.userId}/deactivate`, {
        method: "PUT",
        headers: asSession(root),
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: { code: "SELF_ACTION", message: "You cannot deactivate your own account" },
      });
    });
  });

  describe("surface", () => {
    it("reports health without counting against the rate limit", async () => {
      const res = await h.app.request("/api/health");
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(res.headers.get("X-RateLimit-Limit")).toBeNull();
      expect(body).toMatchObject({ checks: { database: { status: "ok" }, rateLimiter: { status: "ok" } } });
    });

    it("answers unknown endpoints with the error envelope", async () => {
      const res = await h.app.request("/api/nope");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: { code: "NOT_FOUND", message: "API endpoint not found: GET /api/nope" },
      });
    });

    it("sets security and tracing headers", async () => {
      const res = await h.app.request("/api/health", { headers: { "X-Request-ID": "trace-123" } });

      expect(res.headers.get("X-Content-Type-Options")).toBe("nosniff");
      expect(res.headers.get("X-Request-ID")).toBe("trace-123");
    });

    it("allows configured origins and refuses others", async () => {
      const allowed = await h.app.request("/api/health", { headers: { Origin: "https://kanban.example" } });
      const refused = await h.app.request("/api/health", { headers: { Origin: "https://elsewhere.example" } });

      expect(allowed.headers.get("Access-Control-Allow-Origin")).toBe("https://kanban.example");
      expect(refused.headers.get("Access-Control-Allow-Origin")).toBeNull();
    });

    it("lists error codes for documentation readers", async () => {
      const alice = await signUp("alice");

      const res = await h.app.request("/api/docs/errors", { headers: asSession(alice) });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        data: expect.arrayContaining([
          { code: "CSRF_REJECTED", status: 403, message: expect.any(String), category: "client" },
        ]),
      });
    });
  });
});

describe("Web server rate limiting", () => {
  const harnesses: Harness[] = [];

  function harness(options: Parameters<typeof createHarness>[0]): Harness {
    const h = createHarness(options);
    harnesses.push(h);
    return h;
  }

  afterEach(async () => {
    for (const h of harnesses) {
      await h.limiter.close();
      h.storage.close();
    }
    harnesses.length = 0;
  });

  it("lets 50 of 100 anonymous requests through and throttles the rest", async () => {
    const { app } = harness({ maxRequests: 50 });
    const statuses: number[] = [];
    const retryAfter = new Set<string | null>();

    for (let i = 0; i < 100; i++) {
      const res = await app.request("/api/docs/errors");
      statuses.push(res.status);
      if (res.status === 429) retryAfter.add(res.headers.get("Retry-After"));
    }

    expect(statuses.slice(0, 50).every((s) => s === 401)).toBe(true);
    expect(statuses.slice(50).every((s) => s === 429)).toBe(true);
    expect([...retryAfter]).toEqual(["60"]);
  });

  it("describes the throttle in headers and body", async () => {
    const { app } = harness({ maxRequests: 1 });

    const first = await app.request("/api/docs/errors");
    const second = await app.request("/api/docs/errors");

    expect(first.headers.get("X-RateLimit-Limit")).toBe("1");
    expect(first.headers.get("X-RateLimit-Remaining")).toBe("0");
    expect(second.status).toBe(429);
    expect(second.headers.get("X-RateLimit-Reset")).toBe(String((T0 + 60_000) / 1000));
    expect(await second.json()).toEqual({
      error: {
        code: "RATE_LIMITED",
        message: "Too many requests. Please try again later.",
        details: { retryAfter: 60 },
      },
    });
  });

  it("rejects a request failing CSRF before it spends the client's budget", async () => {
    const { app, storage, auth } = harness({ maxRequests: 1 });
    const alice = await createTestUser(storage, "alice");
    const { token } = await auth.sessions.issue(alice);
    const bearer = { Authorization: `Bearer ${token}` };

    const forged = await app.request("/api/groups", json("POST", { name: "Team" }, bearer));
    const list = await app.request("/api/groups", { headers: bearer });

    expect(forged.status).toBe(403);
    expect(await forged.json()).toEqual({ error: { code: "CSRF_REJECTED", message: "CSRF token missing" } });
    expect(list.status).toBe(200);
    expect(list.headers.get("X-RateLimit-Remaining")).toBe("0");
  });

  it("keeps enforcing limits after the shared cache disconnects", async () => {
    const fake = new FakeSharedCache(() => T0);
    const { app } = harness({ maxRequests: 3, cache: new GuardedCache(fake, { timeoutMs: 50 }) });

    expect((await app.request("/api/docs/errors")).status).toBe(401);
    fake.available = false;

    const statuses: number[] = [];
    for (let i = 0; i < 4; i++) {
      statuses.push((await app.request("/api/docs/errors")).status);
    }
    const health = await app.request("/api/health");

    expect(statuses).toEqual([401, 401, 401, 429]);
    expect(await health.json()).toMatchObject({
      checks: { rateLimiter: { status: "error", details: { mode: "shared", degraded: true } } },
    });
  });
});
