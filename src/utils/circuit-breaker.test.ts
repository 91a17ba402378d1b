/**
 * Circuit Breaker Tests
 */

import { describe, it, expect, beforeEach } from "vitest";
import { CircuitBreaker, CircuitBreakerError, type CircuitState } from "./circuit-breaker";

describe("CircuitBreaker", () => {
  let now: number;
  let transitions: Array<[CircuitState, CircuitState]>;
  let breaker: CircuitBreaker;

  const fail = () => Promise.reject(new Error("ECONNREFUSED"));
  const succeed = () => Promise.resolve("ok");

  beforeEach(() => {
    now = 1_000_000;
    transitions = [];
    breaker = new CircuitBreaker({
      name: "test",
      failureThreshold: 3,
      successThreshold: 2,
      resetTimeout: 10_000,
      monitorWindow: 60_000,
      now: () => now,
      onStateChange: (from, to) => transitions.push([from, to]),
    });
  });

  it("passes results through while closed", async () => {
    await expect(breaker.execute(succeed)).resolves.toBe("ok");
    expect(breaker.getState()).toBe("CLOSED");
  });

  it("opens after the failure threshold", async () => {
    for (let i = 0; i < 3; i++) {
      await expect(breaker.execute(fail)).rejects.toThrow("ECONNREFUSED");
    }

    expect(breaker.getState()).toBe("OPEN");
    expect(transitions).toEqual([["CLOSED", "OPEN"]]);
  });

  it("rejects without calling fn while open", async () => {
    for (let i = 0; i < 3; i++) {
      await breaker.execute(fail).catch(() => undefined);
    }

    let called = false;
    const attempt = breaker.execute(async () => {
      called = true;
      return 1;
    });

    await expect(attempt).rejects.toBeInstanceOf(CircuitBreakerError);
    expect(called).toBe(false);
    expect(breaker.getStats()).toEqual({ state: "OPEN", recentFailures: 3, rejected: 1 });
    expect(breaker.getRetryAfter()).toBe(10);
  });

  it("forgets failures outside the monitor window", async () => {
    await breaker.execute(fail).catch(() => undefined);
    await breaker.execute(fail).catch(() => undefined);
    now += 61_000;
    await breaker.execute(fail).catch(() => undefined);

    expect(breaker.getState()).toBe("CLOSED");
  });

  it("half-opens after the reset timeout and closes on successes", async () => {
    for (let i = 0; i < 3; i++) {
      await breaker.execute(fail).catch(() => undefined);
    }
    now += 10_000;

    await breaker.execute(succeed);
    expect(breaker.getState()).toBe("HALF_OPEN");
    await breaker.execute(succeed);

    expect(breaker.getState()).toBe("CLOSED");
    expect(transitions).toEqual([
      ["CLOSED", "OPEN"],
      ["OPEN", "HALF_OPEN"],
      ["HALF_OPEN", "CLOSED"],
    ]);
  });

  it("reopens on a failure while half-open", async () => {
    for (let i = 0; i < 3; i++) {
      await breaker.execute(fail).catch(() => undefined);
    }
    now += 10_000;

    await breaker.execute(fail).catch(() => undefined);

    expect(breaker.getState()).toBe("OPEN");
  });
});
