import assert from "node:assert/strict";
import { afterEach, describe, it } from "node:test";
import { CircuitBreaker, requestWithRetry, sleep } from "./http.js";

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
});

describe("requestWithRetry", () => {
  it("retries failed responses and returns the first success", async () => {
    let calls = 0;
    globalThis.fetch = async () => {
      calls += 1;
      return calls < 3 ? new Response("busy", { status: 503 }) : new Response("ok", { status: 200 });
    };

    const response = await requestWithRetry("http://inference.local/detect", { method: "POST" }, {
      retries: 2,
      backoffMs: 1,
      timeoutMs: 50
    });

    assert.equal(response.status, 200);
    assert.equal(calls, 3);
  });

  it("throws the last HTTP error once retries are exhausted", async () => {
    globalThis.fetch = async () => new Response("down", { status: 502 });

    await assert.rejects(
      requestWithRetry("http://inference.local/detect", { method: "POST" }, { retries: 1, backoffMs: 1, timeoutMs: 50 }),
      /HTTP 502/
    );
  });

  it("stops retrying once the caller aborts", async () => {
    const controller = new AbortController();
    let calls = 0;
    globalThis.fetch = async () => {
      calls += 1;
      controller.abort();
      return new Response("down", { status: 500 });
    };

    await assert.rejects(
      requestWithRetry("http://camera.local/snapshot.jpg", { method: "GET" }, {
        retries: 3,
        backoffMs: 1,
        timeoutMs: 50,
        signal: controller.signal
      }),
      /request aborted/
    );
    assert.equal(calls, 1);
  });
});

describe("sleep", () => {
  it("resolves early when the signal aborts", async () => {
    const controller = new AbortController();
    const startedAt = Date.now();
    const pending = sleep(5_000, controller.signal);
    controller.abort();
    await pending;
    assert.equal(Date.now() - startedAt < 1_000, true);
  });
});

describe("CircuitBreaker", () => {
  it("opens after the failure threshold and half-opens after the reset timeout", () => {
    let nowMs = 1_000;
    const breaker = new CircuitBreaker(2, 5_000, 10_000, () => nowMs);

    breaker.recordFailure(10);
    assert.equal(breaker.canRequest(), true);
    breaker.recordFailure(10);
    assert.equal(breaker.canRequest(), false);
    assert.equal(breaker.snapshot().state, "open");

    nowMs += 10_000;
    assert.equal(breaker.canRequest(), true);
    assert.equal(breaker.snapshot().state, "half_open");

    breaker.recordSuccess(5);
    assert.deepEqual(breaker.snapshot(), {
      state: "closed",
      failureCount: 0,
      lastFailureAt: new Date(1_000).toISOString(),
      openedAt: undefined,
      lastLatencyMs: 5
    });
  });

  it("opens immediately on a slow failure", () => {
    const breaker = new CircuitBreaker(5, 100, 10_000, () => 0);
    breaker.recordFailure(250);
    assert.equal(breaker.canRequest(), false);
  });
});
