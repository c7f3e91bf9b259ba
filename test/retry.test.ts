import { afterEach, describe, expect, it, vi } from "vitest";
import { pino } from "pino";
import { Readable } from "node:stream";
import { constantBackoff } from "../src/backoff.js";
import { BodyRewindError } from "../src/errors.js";
import type { RetryExhaustedEvent, RetryScheduledEvent } from "../src/events.js";
import { newRequest } from "../src/request.js";
import { noRetryPolicy, RetryableClient, serverErrorsRetryPolicy } from "../src/retry.js";
import type { OutboundResponse } from "../src/types.js";
import { MAX_TIMER_DELAY_MS } from "../src/utils/sleep.js";
import { fakeResponse, requestOf, ScriptedTransport } from "./helpers.js";

const ORDERS_URL = "http://orders.test/orders";
const logger = pino({ level: "silent" });

function client(inner: ScriptedTransport, retryMax: number, backoffMs = 0): RetryableClient {
  return new RetryableClient(inner, { retryMax, backoff: constantBackoff(backoffMs), logger });
}

function nextScheduled(c: RetryableClient): Promise<RetryScheduledEvent> {
  return new Promise((resolve) => c.once("retry:scheduled", resolve));
}

afterEach(() => {
  vi.useRealTimers();
});

describe("RetryableClient", () => {
  it("makes retryMax + 1 attempts and returns the last response", async () => {
    const inner = new ScriptedTransport([() => fakeResponse(503)]);
    const c = client(inner, 2);
    const exhausted: RetryExhaustedEvent[] = [];
    c.on("retry:exhausted", (e: RetryExhaustedEvent) => exhausted.push(e));

    const res = await c.do(requestOf(ORDERS_URL));

    expect(res.status).toBe(503);
    expect(inner.calls).toBe(3);
    expect(inner.requests.map((r) => r.meta.retryAttempt)).toEqual([0, 1, 2]);
    expect(exhausted).toEqual([{ method: "GET", url: ORDERS_URL, status: 503, attempts: 3 }]);
  });

  it("sends once when retryMax is 0", async () => {
    const inner = new ScriptedTransport([() => fakeResponse(500)]);
    expect((await client(inner, 0).do(requestOf(ORDERS_URL))).status).toBe(500);
    expect(inner.calls).toBe(1);
  });

  it("returns immediately on a response the policy accepts", async () => {
    const inner = new ScriptedTransport([() => fakeResponse(404)]);
    expect((await client(inner, 3).do(requestOf(ORDERS_URL))).status).toBe(404);
    expect(inner.calls).toBe(1);
  });

  it("drains and closes the body of a response it retries", async () => {
    const first = fakeResponse(502, "x".repeat(10_000));
    const inner = new ScriptedTransport([first, fakeResponse(200)]);

    const res = await client(inner, 1).do(requestOf(ORDERS_URL));
    expect(res.status).toBe(200);
    expect(first.body.destroyed).toBe(true);
  });

  it("rejects with the last error after retrying transport failures", async () => {
    const errors = [new Error("ECONNREFUSED 1"), new Error("ECONNREFUSED 2"), new Error("ECONNREFUSED 3")];
    const inner = new ScriptedTransport(errors);

    await expect(client(inner, 2).do(requestOf(ORDERS_URL))).rejects.toBe(errors[2]);
    expect(inner.calls).toBe(3);
  });

  it("waits for Retry-After on 503 before the next attempt", async () => {
    vi.useFakeTimers();
    const inner = new ScriptedTransport([fakeResponse(503, "", { "retry-after": "2" }), fakeResponse(200, "ok")]);
    const c = client(inner, 3, 10);
    const scheduled = nextScheduled(c);

    let settled = false;
    const pending = c.do(requestOf(ORDERS_URL)).finally(() => {
      settled = true;
    });

    expect(await scheduled).toEqual({ method: "GET", url: ORDERS_URL, status: 503, attempt: 0, waitMs: 2000 });
    await vi.advanceTimersByTimeAsync(1999);
    expect(settled).toBe(false);
    expect(inner.calls).toBe(1);

    await vi.advanceTimersByTimeAsync(1);
    const res = await pending;
    expect(res.status).toBe(200);
    expect(inner.calls).toBe(2);
  });

  it("honours a Retry-After longer than a single timer can wait", async () => {
    vi.useFakeTimers();
    const inner = new ScriptedTransport([fakeResponse(503, "", { "retry-after": "2592000" }), fakeResponse(200)]);
    const c = client(inner, 1);
    const scheduled = nextScheduled(c);
    const pending = c.do(requestOf(ORDERS_URL));

    expect((await scheduled).waitMs).toBe(2_592_000_000);
    await vi.advanceTimersByTimeAsync(200);
    expect(inner.calls).toBe(1);

    await vi.advanceTimersByTimeAsync(MAX_TIMER_DELAY_MS);
    expect(inner.calls).toBe(1);

    await vi.advanceTimersByTimeAsync(2_592_000_000 - MAX_TIMER_DELAY_MS - 200);
    expect((await pending).status).toBe(200);
    expect(inner.calls).toBe(2);
  });

  it("uses the backoff when Retry-After is not on a 429/503", async () => {
    const inner = new ScriptedTransport([fakeResponse(500, "", { "retry-after": "120" }), fakeResponse(200)]);
    const c = client(inner, 1, 5);
    const scheduled = nextScheduled(c);

    await c.do(requestOf(ORDERS_URL));
    expect((await scheduled).waitMs).toBe(5);
  });

  it("gives up instead of waiting past the deadline", async () => {
    const inner = new ScriptedTransport([() => fakeResponse(503)]);
    const req = { ...requestOf(ORDERS_URL), deadline: Date.now() + 1000 };

    const res = await client(inner, 3, 5000).do(req);
    expect(res.status).toBe(503);
    expect(inner.calls).toBe(1);
  });

  it("rejects with the attempt's error when the deadline is too close", async () => {
    const refused = new Error("ECONNREFUSED");
    const inner = new ScriptedTransport([refused]);
    const req = { ...requestOf(ORDERS_URL), deadline: Date.now() + 1000 };

    await expect(client(inner, 3, 5000).do(req)).rejects.toBe(refused);
    expect(inner.calls).toBe(1);
  });

  it("stops waiting when the caller cancels", async () => {
    const controller = new AbortController();
    const cancelled = new Error("caller went away");
    const inner = new ScriptedTransport([() => fakeResponse(503)]);
    const c = client(inner, 3, 60_000);
    const scheduled = nextScheduled(c);

    const pending = c.do({ ...requestOf(ORDERS_URL), signal: controller.signal });
    await scheduled;
    controller.abort(cancelled);

    await expect(pending).rejects.toBe(cancelled);
    expect(inner.calls).toBe(1);
  });

  it("does not retry once the caller's signal aborted", async () => {
    const controller = new AbortController();
    const cancelled = new Error("cancelled");
    const inner = new ScriptedTransport([
      () => {
        controller.abort(cancelled);
        return fakeResponse(503);
      },
    ]);

    await expect(client(inner, 3).do({ ...requestOf(ORDERS_URL), signal: controller.signal })).rejects.toBe(cancelled);
    expect(inner.calls).toBe(1);
  });

  it("replays the body for every attempt", async () => {
    const bodies: string[] = [];
    const inner = new ScriptedTransport([
      (req) => {
        const body = req.body;
        bodies.push(typeof body === "string" || body instanceof Uint8Array ? Buffer.from(body).toString() : "stream");
        return fakeResponse(bodies.length < 3 ? 500 : 201);
      },
    ]);

    const res = await client(inner, 3).do(await newRequest("POST", ORDERS_URL, '{"qty":2}'));
    expect(res.status).toBe(201);
    expect(bodies).toEqual(['{"qty":2}', '{"qty":2}', '{"qty":2}']);
  });

  it("refuses to retry a stream body without getBody", async () => {
    const inner = new ScriptedTransport([() => fakeResponse(500)]);
    const req = { ...requestOf(ORDERS_URL, "POST"), body: Readable.from(["once"]) };

    await expect(client(inner, 2).do(req)).rejects.toBeInstanceOf(BodyRewindError);
    expect(inner.calls).toBe(1);
  });

  it("reports a failing body factory as a rewind error", async () => {
    const inner = new ScriptedTransport([() => fakeResponse(500)]);
    const broken = new Error("file vanished");
    const req = { ...requestOf(ORDERS_URL, "POST"), body: "x", getBody: () => Promise.reject(broken) };

    const err = await client(inner, 2).do(req).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(BodyRewindError);
    expect(err instanceof Error && err.cause).toBe(broken);
    expect(inner.calls).toBe(1);
  });

  it("rejects with the policy's error and closes the response", async () => {
    const replaced = new Error("quota exhausted");
    const res = fakeResponse(429);
    const c = new RetryableClient(new ScriptedTransport([res]), {
      retryMax: 3,
      checkRetry: () => ({ retry: false, error: replaced }),
      logger,
    });

    await expect(c.do(requestOf(ORDERS_URL))).rejects.toBe(replaced);
    expect(res.body.destroyed).toBe(true);
  });

  it("validates retryMax", () => {
    expect(() => client(new ScriptedTransport([fakeResponse(200)]), -1)).toThrow("retryMax must be a non-negative integer");
  });
});

describe("serverErrorsRetryPolicy", () => {
  const policy = serverErrorsRetryPolicy();
  const ctx = { attempt: 0, request: requestOf(ORDERS_URL) };
  const status = (code: number): OutboundResponse => fakeResponse(code);

  it.each([
    [0, true],
    [200, false],
    [404, false],
    [429, false],
    [500, true],
    [501, false],
    [502, true],
    [503, true],
  ])("status %i -> retry %s", async (code, retry) => {
    expect(await policy(ctx, status(code), undefined)).toEqual({ retry });
  });

  it("retries transport errors and keeps them", async () => {
    const err = new Error("reset");
    expect(await policy(ctx, undefined, err)).toEqual({ retry: true, error: err });
  });

  it("stops once the signal aborted", async () => {
    const controller = new AbortController();
    const reason = new Error("gone");
    controller.abort(reason);
    expect(await policy({ ...ctx, signal: controller.signal }, undefined, new Error("reset"))).toEqual({
      retry: false,
      error: reason,
    });
  });

  it("noRetryPolicy passes the error through", () => {
    const err = new Error("x");
    expect(noRetryPolicy(ctx, undefined, err)).toEqual({ retry: false, error: err });
  });
});
