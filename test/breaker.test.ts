// test/breaker.test.ts
import { describe, expect, it } from "vitest";
import { pino } from "pino";
import { RollingWindowBreaker } from "../src/breaker.js";
import { circuitBreakerDecorator, defaultBucket } from "../src/decorators/circuitBreaker.js";
import { CircuitOpenError, isCircuitOpenError } from "../src/errors.js";
import type { BreakerStateEvent } from "../src/events.js";
import { withEndpointTemplate, withTargetId } from "../src/meta.js";
import { serverErrorsRetryPolicy } from "../src/retry.js";
import type { BreakerAdmission, CircuitBreaker } from "../src/types.js";
import { RollingWindow } from "../src/utils/rollingWindow.js";
import { fakeResponse, RecordingTelemetry, requestOf, ScriptedTransport } from "./helpers.js";

const logger = pino({ level: "silent" });

describe("RollingWindow", () => {
  it("forgets the oldest outcome once full", () => {
    const w = new RollingWindow(3);
    w.push(1);
    w.push(1);
    w.push(0);
    expect(w.failures()).toBe(2);

    w.push(0); // evicts the first failure
    expect(w.count()).toBe(3);
    expect(w.failures()).toBe(1);
    expect(w.failureRate()).toBeCloseTo(1 / 3);
  });
});

describe("RollingWindowBreaker", () => {
  it("opens when failure rate exceeds threshold after minRequests", () => {
    const br = new RollingWindowBreaker({
      windowSize: 10,
      minRequests: 4,
      failureThreshold: 0.5,
      cooldownMs: 1000,
      halfOpenProbeCount: 2,
    });

    const key = "svc";

    br.allow(key).failure();
    br.allow(key).success();
    br.allow(key).failure();
    br.allow(key).success();
    expect(br.state(key)).toBe("CLOSED"); // successes never trip the breaker

    br.allow(key).failure();
    expect(br.state(key)).toBe("OPEN");
  });

  it("fails fast while OPEN until cooldown, then HALF_OPEN", () => {
    const br = new RollingWindowBreaker({
      windowSize: 5,
      minRequests: 1,
      failureThreshold: 1,
      cooldownMs: 100,
      halfOpenProbeCount: 2,
    });

    const key = "svc";
    const t0 = 1000;

    br.allow(key, t0);
    br.onFailure(key, t0);
    expect(br.state(key)).toBe("OPEN");

    const d1 = br.allow(key, t0 + 50);
    expect(d1.allowed).toBe(false);
    expect(d1.state).toBe("OPEN");
    expect(d1.retryAfterMs).toBe(50);

    const d2 = br.allow(key, t0 + 120);
    expect(d2.allowed).toBe(true);
    expect(br.state(key)).toBe("HALF_OPEN");
  });

  it("half-open allows limited probes and closes after enough successes", () => {
    const br = new RollingWindowBreaker({
      windowSize: 5,
      minRequests: 1,
      failureThreshold: 1,
      cooldownMs: 50,
      halfOpenProbeCount: 2,
    });

    const key = "svc";
    const t0 = 1000;

    br.allow(key, t0);
    br.onFailure(key, t0);
    expect(br.state(key)).toBe("OPEN");

    // This call both transitions to HALF_OPEN and consumes probe #1
    const probe1 = br.allow(key, t0 + 60);
    expect(br.state(key)).toBe("HALF_OPEN");
    expect(probe1.allowed).toBe(true);

    const probe2 = br.allow(key, t0 + 61);
    expect(probe2.allowed).toBe(true);

    // max probes in flight
    const blocked = br.allow(key, t0 + 62);
    expect(blocked.allowed).toBe(false);
    expect(blocked.state).toBe("HALF_OPEN");

    probe1.success();
    expect(br.state(key)).toBe("HALF_OPEN");

    probe2.success();
    expect(br.state(key)).toBe("CLOSED");
  });

  it("half-open reopens on any failure", () => {
    const br = new RollingWindowBreaker({
      windowSize: 5,
      minRequests: 1,
      failureThreshold: 1,
      cooldownMs: 50,
      halfOpenProbeCount: 2,
    });

    const key = "svc";
    const t0 = 1000;

    br.allow(key, t0);
    br.onFailure(key, t0);

    br.allow(key, t0 + 60);
    expect(br.state(key)).toBe("HALF_OPEN");

    br.allow(key, t0 + 61);
    br.onFailure(key, t0 + 61);
    expect(br.state(key)).toBe("OPEN");
  });

  it("emits every state transition", () => {
    const br = new RollingWindowBreaker({ windowSize: 5, minRequests: 1, failureThreshold: 1, cooldownMs: 50, halfOpenProbeCount: 1 });
    const events: BreakerStateEvent[] = [];
    br.on("breaker:state", (e: BreakerStateEvent) => events.push(e));

    br.allow("svc", 1000);
    br.onFailure("svc", 1000);
    br.allow("svc", 1060).success();

    expect(events).toEqual([
      { key: "svc", from: "CLOSED", to: "OPEN" },
      { key: "svc", from: "OPEN", to: "HALF_OPEN" },
      { key: "svc", from: "HALF_OPEN", to: "CLOSED" },
    ]);
  });

  it("counts an admission once however often it is settled", () => {
    const br = new RollingWindowBreaker();
    const admission = br.allow("svc");
    admission.failure();
    admission.failure();
    admission.success();

    expect(br.snapshot()).toEqual([
      { key: "svc", state: "CLOSED", openedAtMs: undefined, halfOpenInFlight: 0, windowCount: 1, windowFailures: 1 },
    ]);
  });

  it("rejects invalid options", () => {
    expect(() => new RollingWindowBreaker({ failureThreshold: 2 })).toThrow("failureThreshold must be 0..1");
    expect(() => new RollingWindowBreaker({ windowSize: 0 })).toThrow("windowSize must be > 0");
  });
});

class RecordingBreaker implements CircuitBreaker {
  readonly buckets: string[] = [];
  readonly outcomes: Array<"success" | "failure"> = [];

  constructor(private readonly allowed = true) {}

  allow(bucket: string): BreakerAdmission {
    this.buckets.push(bucket);
    return {
      allowed: this.allowed,
      retryAfterMs: this.allowed ? undefined : 250,
      success: () => void this.outcomes.push("success"),
      failure: () => void this.outcomes.push("failure"),
    };
  }
}

describe("circuitBreakerDecorator", () => {
  it("rejects denied requests without I/O and counts them", async () => {
    const telemetry = new RecordingTelemetry();
    const base = new ScriptedTransport([fakeResponse(200)]);
    const transport = circuitBreakerDecorator(new RecordingBreaker(false), { telemetry, logger })(base);

    const err = await transport.roundTrip(withTargetId(requestOf("http://users.test/u/1"), "users-api")).catch((e: unknown) => e);

    expect(isCircuitOpenError(err)).toBe(true);
    expect(err).toBeInstanceOf(CircuitOpenError);
    if (err instanceof CircuitOpenError) {
      expect(err.key).toBe("users-api");
      expect(err.retryAfterMs).toBe(250);
    }
    expect(base.calls).toBe(0);
    expect(telemetry.records).toEqual([
      { kind: "count", name: "http.client.circuit_breaker.open", value: 1, tags: { bucket: "users-api", target_id: "users-api" } },
    ]);
  });

  it("tags an untargeted denial with an empty target id", async () => {
    const telemetry = new RecordingTelemetry();
    const transport = circuitBreakerDecorator(new RecordingBreaker(false), { telemetry, logger })(
      new ScriptedTransport([fakeResponse(200)])
    );

    await expect(transport.roundTrip(requestOf("http://users.test/u/1"))).rejects.toBeInstanceOf(CircuitOpenError);
    expect(telemetry.records.map((r) => r.tags)).toEqual([{ bucket: "users.test", target_id: "" }]);
  });

  it("reports transport errors and 5xx as failures, anything else as success", async () => {
    const breaker = new RecordingBreaker();
    const base = new ScriptedTransport([fakeResponse(503), fakeResponse(200), fakeResponse(404), new Error("reset")]);
    const transport = circuitBreakerDecorator(breaker, { logger })(base);
    const req = requestOf("http://users.test/u/1");

    await transport.roundTrip(req);
    await transport.roundTrip(req);
    await transport.roundTrip(req);
    await expect(transport.roundTrip(req)).rejects.toThrow("reset");

    expect(breaker.outcomes).toEqual(["failure", "success", "success", "failure"]);
  });

  it("honours a custom check", async () => {
    const breaker = new RecordingBreaker();
    const transport = circuitBreakerDecorator(breaker, { check: (res) => res.status !== 429, logger })(
      new ScriptedTransport([fakeResponse(429)])
    );

    await transport.roundTrip(requestOf("http://users.test/"));
    expect(breaker.outcomes).toEqual(["failure"]);
  });

  it("counts a 501 as a breaker failure although it is never retried", async () => {
    const breaker = new RecordingBreaker();
    const res = await circuitBreakerDecorator(breaker, { logger })(new ScriptedTransport([fakeResponse(501)])).roundTrip(
      requestOf("http://users.test/")
    );

    expect(breaker.outcomes).toEqual(["failure"]);
    const decision = await serverErrorsRetryPolicy()({ attempt: 0, request: requestOf("http://users.test/") }, res, undefined);
    expect(decision.retry).toBe(false);
  });

  it("buckets by target id, then endpoint template, then host", () => {
    const req = requestOf("http://users.test:8080/u/1");
    expect(defaultBucket(withTargetId(withEndpointTemplate(req, "/u/{id}"), "users-api"))).toBe("users-api");
    expect(defaultBucket(withEndpointTemplate(req, "/u/{id}"))).toBe("/u/{id}");
    expect(defaultBucket(req)).toBe("users.test:8080");
  });

  it("opens a rolling window breaker after repeated server errors", async () => {
    const breaker = new RollingWindowBreaker({ windowSize: 4, minRequests: 2, failureThreshold: 1, cooldownMs: 60_000, halfOpenProbeCount: 1 });
    const base = new ScriptedTransport([() => fakeResponse(500)]);
    const transport = circuitBreakerDecorator(breaker, { logger })(base);
    const req = withTargetId(requestOf("http://users.test/"), "users-api");

    await transport.roundTrip(req);
    await transport.roundTrip(req);
    await expect(transport.roundTrip(req)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(base.calls).toBe(2);
  });
});
