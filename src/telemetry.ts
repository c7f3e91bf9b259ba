import { isTimeoutError } from "./errors.js";
import type { OutboundResponse } from "./types.js";

export type Tags = Record<string, string>;

/**
 * Fire-and-forget metrics sink. Implementations must not block the request path;
 * buffering and shipping are their concern.
 */
export interface Telemetry {
  incr(name: string, tags?: Tags): void;
  count(name: string, value: number, tags?: Tags): void;
  timing(name: string, durationMs: number, tags?: Tags): void;
  histogram(name: string, value: number, tags?: Tags): void;
  gauge(name: string, value: number, tags?: Tags): void;
}

export const noopTelemetry: Telemetry = {
  incr() {},
  count() {},
  timing() {},
  histogram() {},
  gauge() {},
};

/**
 * Normalizes a tag value: trims trailing "/", replaces "{" with "_" and drops "}",
 * so endpoint templates like "/users/{id}/" become "/users/_id".
 */
export function sanitizeMetricTagValue(value: string): string {
  if (value === "") return "";
  const trimmed = value.replace(/\/+$/, "");
  if (trimmed === "") return "/";
  return trimmed.replaceAll("{", "_").replaceAll("}", "");
}

/** status / status_class tags describing the outcome of a round trip. */
export function outcomeTags(res: OutboundResponse | undefined, err: unknown): Tags {
  if (err !== undefined || res === undefined) {
    return { status: isTimeoutError(err) ? "timeout" : "error", status_class: "error" };
  }
  return { status: String(res.status), status_class: `${Math.floor(res.status / 100)}xx` };
}

/** Tag value for connection-phase metrics: ok, timeout or error. */
export function phaseStatus(err: Error | undefined): string {
  if (err === undefined) return "ok";
  return isTimeoutError(err) ? "timeout" : "error";
}
