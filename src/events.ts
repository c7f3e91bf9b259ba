import type { BreakerState, HttpMethod } from "./types.js";

export type TransitEventName = "retry:scheduled" | "retry:exhausted" | "breaker:state";

export interface BreakerStateEvent {
  key: string;
  from: BreakerState;
  to: BreakerState;
}

interface RetryEventBase {
  method: HttpMethod;
  url: string;
  status?: number;    // set when the last attempt produced a response
  errorName?: string; // set when it failed
}

export interface RetryScheduledEvent extends RetryEventBase {
  /** Zero-based attempt that just failed. */
  attempt: number;
  waitMs: number;
}

export interface RetryExhaustedEvent extends RetryEventBase {
  attempts: number;
}
