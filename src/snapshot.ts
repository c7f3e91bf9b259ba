import type { BreakerState } from "./types.js";

export interface BreakerSnapshot {
  key: string;
  state: BreakerState;
  openedAtMs?: number;
  halfOpenInFlight: number;
  windowCount: number;
  windowFailures: number;
}

export interface ClientSnapshot {
  /** Open connections of the client's pool, keyed by "tcp:host:port". */
  connections: Record<string, number>;
  breakers: BreakerSnapshot[];
}
