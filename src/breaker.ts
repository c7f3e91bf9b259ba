// src/breaker.ts
import { EventEmitter } from "node:events";
import type { BreakerStateEvent } from "./events.js";
import type { BreakerSnapshot } from "./snapshot.js";
import type { BreakerAdmission, BreakerOptions, BreakerState, CircuitBreaker } from "./types.js";
import { RollingWindow } from "./utils/rollingWindow.js";

interface BreakerBucket {
  state: BreakerState;
  openedAtMs?: number;
  halfOpenInFlight: number;
  halfOpenSuccesses: number;

  window: RollingWindow;
}

export interface BreakerDecision extends BreakerAdmission {
  state: BreakerState;
}

export const DEFAULT_BREAKER_OPTIONS: BreakerOptions = {
  windowSize: 50,
  minRequests: 20,
  failureThreshold: 0.5,
  cooldownMs: 5000,
  halfOpenProbeCount: 3,
};

const noop = (): void => {};

/**
 * Process-local, bucket-keyed circuit breaker.
 * - CLOSED: allow, track outcomes in a rolling window; OPEN once enough requests failed.
 * - OPEN: block until the cooldown passes, then HALF_OPEN.
 * - HALF_OPEN: allow a few probes; close after that many successes, reopen on any failure.
 *
 * Emits "breaker:state" ({@link BreakerStateEvent}) on every transition.
 */
export class RollingWindowBreaker extends EventEmitter implements CircuitBreaker {
  private readonly opts: BreakerOptions;
  private readonly buckets = new Map<string, BreakerBucket>();

  constructor(opts: Partial<BreakerOptions> = {}) {
    super();
    const o = { ...DEFAULT_BREAKER_OPTIONS, ...opts };
    if (!Number.isInteger(o.windowSize) || o.windowSize <= 0) throw new Error("windowSize must be > 0");
    if (!Number.isFinite(o.minRequests) || o.minRequests < 0) throw new Error("minRequests must be >= 0");
    if (o.failureThreshold < 0 || o.failureThreshold > 1) throw new Error("failureThreshold must be 0..1");
    if (!Number.isFinite(o.cooldownMs) || o.cooldownMs <= 0) throw new Error("cooldownMs must be > 0");
    if (!Number.isInteger(o.halfOpenProbeCount) || o.halfOpenProbeCount <= 0)
      throw new Error("halfOpenProbeCount must be > 0");
    this.opts = o;
  }

  /**
   * Decide whether a call for this bucket may go out. An allowed decision must be
   * settled exactly once with `success()` or `failure()`.
   */
  allow(key: string, nowMs: number = Date.now()): BreakerDecision {
    const b = this.bucket(key);

    if (b.state === "OPEN") {
      const remaining = this.opts.cooldownMs - (nowMs - (b.openedAtMs ?? nowMs));
      if (remaining > 0) return blocked("OPEN", remaining);
      this.transition(key, b, "HALF_OPEN", nowMs);
    }

    if (b.state === "HALF_OPEN") {
      if (b.halfOpenInFlight >= this.opts.halfOpenProbeCount) return blocked("HALF_OPEN", 0);
      b.halfOpenInFlight += 1;
    }

    let settled = false;
    const settle = (fn: (key: string) => void) => () => {
      if (settled) return;
      settled = true;
      fn(key);
    };
    return {
      allowed: true,
      state: b.state,
      success: settle((k) => this.onSuccess(k)),
      failure: settle((k) => this.onFailure(k)),
    };
  }

  onSuccess(key: string, nowMs: number = Date.now()): void {
    const b = this.bucket(key);

    if (b.state === "HALF_OPEN") {
      b.halfOpenInFlight = Math.max(0, b.halfOpenInFlight - 1);
      b.halfOpenSuccesses += 1;
      if (b.halfOpenSuccesses >= this.opts.halfOpenProbeCount) this.transition(key, b, "CLOSED", nowMs);
      return;
    }

    if (b.state === "CLOSED") b.window.push(0);
  }

  onFailure(key: string, nowMs: number = Date.now()): void {
    const b = this.bucket(key);

    if (b.state === "HALF_OPEN") {
      this.transition(key, b, "OPEN", nowMs);
      return;
    }

    if (b.state === "CLOSED") {
      b.window.push(1);
      if (b.window.count() >= this.opts.minRequests && b.window.failureRate() >= this.opts.failureThreshold) {
        this.transition(key, b, "OPEN", nowMs);
      }
    }
  }

  state(key: string): BreakerState {
    return this.bucket(key).state;
  }

  snapshot(): BreakerSnapshot[] {
    const out: BreakerSnapshot[] = [];
    for (const [key, b] of this.buckets) {
      out.push({
        key,
        state: b.state,
        openedAtMs: b.openedAtMs,
        halfOpenInFlight: b.halfOpenInFlight,
        windowCount: b.window.count(),
        windowFailures: b.window.failures(),
      });
    }
    return out;
  }

  private bucket(key: string): BreakerBucket {
    let b = this.buckets.get(key);
    if (!b) {
      b = {
        state: "CLOSED",
        halfOpenInFlight: 0,
        halfOpenSuccesses: 0,
        window: new RollingWindow(this.opts.windowSize),
      };
      this.buckets.set(key, b);
    }
    return b;
  }

  private transition(key: string, b: BreakerBucket, to: BreakerState, nowMs: number): void {
    const from = b.state;
    b.state = to;
    b.openedAtMs = to === "OPEN" ? nowMs : undefined;
    b.halfOpenInFlight = 0;
    b.halfOpenSuccesses = 0;

    // old history would reopen the circuit right away
    if (to === "CLOSED") b.window.reset();

    const event: BreakerStateEvent = { key, from, to };
    this.emit("breaker:state", event);
  }
}

function blocked(state: BreakerState, retryAfterMs: number): BreakerDecision {
  return { allowed: false, state, retryAfterMs, success: noop, failure: noop };
}
