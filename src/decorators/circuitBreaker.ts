import { CircuitOpenError } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import { noopTelemetry, sanitizeMetricTagValue, type Tags, type Telemetry } from "../telemetry.js";
import type { CircuitBreaker, OutboundRequest, OutboundResponse, TransportDecorator } from "../types.js";

export const CIRCUIT_OPEN_METRIC = "http.client.circuit_breaker.open";

/** true when the response counts as a success for the breaker. */
export type BreakerCheckFunc = (res: OutboundResponse) => boolean;

export type BucketFunc = (req: OutboundRequest) => string;

export const defaultBreakerCheck: BreakerCheckFunc = (res) => res.status < 500;

/** Target id, else endpoint template, else the URL host. */
export const defaultBucket: BucketFunc = (req) =>
  req.meta.targetId || req.meta.endpointTemplate || new URL(req.url).host;

export interface CircuitBreakerDecoratorOptions {
  check?: BreakerCheckFunc;
  bucket?: BucketFunc;
  telemetry?: Telemetry;
  logger?: Logger;
}

/**
 * Gates each round trip on the breaker's admission for the request's bucket.
 * A denied request does no I/O and rejects with CircuitOpenError. Transport errors
 * and responses failing `check` count as failures.
 */
export function circuitBreakerDecorator(
  breaker: CircuitBreaker,
  opts: CircuitBreakerDecoratorOptions = {}
): TransportDecorator {
  const check = opts.check ?? defaultBreakerCheck;
  const bucketOf = opts.bucket ?? defaultBucket;
  const telemetry = opts.telemetry ?? noopTelemetry;
  const log = opts.logger ?? createLogger("circuit-breaker");

  return (next) => ({
    async roundTrip(req) {
      const bucket = bucketOf(req);
      const admission = breaker.allow(bucket);

      if (!admission.allowed) {
        const tags: Tags = {
          bucket: sanitizeMetricTagValue(bucket),
          target_id: sanitizeMetricTagValue(req.meta.targetId ?? ""),
        };
        telemetry.incr(CIRCUIT_OPEN_METRIC, tags);
        log.debug({ bucket, url: req.url }, "circuit open, request rejected");

        throw new CircuitOpenError(bucket, admission.retryAfterMs ?? 0);
      }

      let res: OutboundResponse;
      try {
        res = await next.roundTrip(req);
      } catch (err) {
        admission.failure();
        throw err;
      }

      if (check(res)) admission.success();
      else admission.failure();
      return res;
    },
  });
}
