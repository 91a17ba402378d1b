/**
 * Body Limit Middleware Tests
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { bodyLimit } from "./body-limit";
import { errorHandler } from "./middleware";

function createApp(maxSize: number): Hono {
  const app = new Hono();
  app.use("*", bodyLimit(maxSize));
  app.post("/", async (c) => c.json({ length: (await c.req.text()).length }));
  app.get("/", (c) => c.json({ ok: true }));
  app.onError(errorHandler);
  return app;
}

describe("bodyLimit", () => {
  it("passes bodies within the limit to the handler", async () => {
    const res = await createApp(16).request("/", { method: "POST", body: "0123456789" });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ length: 10 });
  });

  it("rejects a declared length over the limit", async () => {
    const res = await createApp(1024).request("/", {
      method: "POST",
      headers: { "Content-Length": "2048" },
      body: "x".repeat(2048),
    });

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({
      error: { code: "PAYLOAD_TOO_LARGE", message: "Request body too large. Max: 1KB", details: { maxSize: 1024 } },
    });
  });

  it("measures bodies sent without a length", async () => {
    const res = await createApp(1024).request("/", { method: "POST", body: "x".repeat(2048) });

    expect(res.status).toBe(413);
  });

  it("ignores methods without bodies", async () => {
    const res = await createApp(1).request("/");

    expect(res.status).toBe(200);
  });
});
