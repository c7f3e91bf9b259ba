import type { RequestHook, ResponseHook } from "./decorators/hooks.js";
import { retryCount } from "./meta.js";
import { outcomeTags, sanitizeMetricTagValue, type Telemetry } from "./telemetry.js";

export const FORWARDED_HEADER_DIFF_METRIC = "http.client.forwarded_header.diff";
export const RETRY_COUNT_METRIC = "http.client.request.retry.count";
export const RETRY_HEADER = "x-retry";

/**
 * Copies the forwarded tracing headers from the request meta onto the request.
 * A header the caller already set keeps its value, even an empty one; a differing
 * value is counted.
 */
export function forwardTracingHeadersHook(telemetry: Telemetry): RequestHook {
  return function forwardTracingHeaders(req) {
    for (const [header, value] of Object.entries(req.meta.forwardedHeaders)) {
      const existing = req.headers[header];
      if (existing === undefined) {
        req.headers[header] = value;
        continue;
      }
      if (existing !== value) {
        telemetry.incr(FORWARDED_HEADER_DIFF_METRIC, {
          stack: "node",
          header,
          target_id: sanitizeMetricTagValue(req.meta.targetId ?? ""),
        });
      }
    }
  };
}

/** Stamps `x-retry: <n>` on retries. */
export const retryHeaderHook: RequestHook = function retryHeader(req) {
  const n = retryCount(req);
  if (n > 0) req.headers[RETRY_HEADER] = String(n);
};

/** Counts the outcome of every retry. */
export function retryMetricHook(telemetry: Telemetry): ResponseHook {
  return function retryMetric(req, res, err) {
    if (retryCount(req) === 0) return;
    telemetry.incr(RETRY_COUNT_METRIC, {
      technology: "node",
      target_id: sanitizeMetricTagValue(req.meta.targetId ?? ""),
      method: req.method.toLowerCase(),
      ...outcomeTags(res, err),
    });
  };
}
