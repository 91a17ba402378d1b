import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { getCorrelationId } from "../logging";
import { REQUEST_ID_HEADER, RESPONSE_TIME_HEADER, getRequestContext, requestContext } from "./request-context";

function createApp(): Hono {
  const app = new Hono();
  app.use("*", requestContext());
  app.get("/context", (c) => {
    const ctx = getRequestContext();
    return c.json({ requestId: ctx?.requestId, method: ctx?.method, correlationId: getCorrelationId() });
  });
  return app;
}

describe("requestContext", () => {
  it("generates a request id and exposes it to handlers and logs", async () => {
    const res = await createApp().request("/context");
    const requestId = res.headers.get(REQUEST_ID_HEADER);

    expect(requestId).toMatch(/^req-[A-Za-z0-9_-]{12}$/);
    expect(await res.json()).toEqual({ requestId, method: "GET", correlationId: requestId });
  });

  it("echoes a well-formed client request id", async () => {
    const res = await createApp().request("/context", { headers: { [REQUEST_ID_HEADER]: "client-42.a" } });

    expect(res.headers.get(REQUEST_ID_HEADER)).toBe("client-42.a");
  });

  it("replaces a malformed client request id", async () => {
    const res = await createApp().request("/context", { headers: { [REQUEST_ID_HEADER]: "bad id with spaces" } });

    expect(res.headers.get(REQUEST_ID_HEADER)).toMatch(/^req-/);
  });

  it("reports the response time", async () => {
    const res = await createApp().request("/context");

    expect(res.headers.get(RESPONSE_TIME_HEADER)).toMatch(/^\d+\.\d{2}ms$/);
  });

  it("has no context outside a request", () => {
    expect(getRequestContext()).toBeUndefined();
  });
});
