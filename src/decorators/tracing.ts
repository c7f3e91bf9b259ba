// src/decorators/tracing.ts
import { finished } from "node:stream";
import { SpanKind, SpanStatusCode, trace, type Tracer } from "@opentelemetry/api";
import {
  ATTR_HTTP_REQUEST_METHOD,
  ATTR_HTTP_RESPONSE_STATUS_CODE,
  ATTR_URL_FULL,
} from "@opentelemetry/semantic-conventions";
import { composeClientTrace } from "../clientTrace.js";
import { toError } from "../errors.js";
import { withMeta } from "../meta.js";
import {
  noopTelemetry,
  outcomeTags,
  phaseStatus,
  sanitizeMetricTagValue,
  type Tags,
  type Telemetry,
} from "../telemetry.js";
import type { ClientTrace, OutboundRequest, OutboundResponse, TransportDecorator } from "../types.js";
import { VERSION } from "../version.js";

export const METRIC_PREFIX = "http.client.";
export const REQUEST_TIME_METRIC = `${METRIC_PREFIX}request.time`;
export const DNS_TIME_METRIC = `${METRIC_PREFIX}dns.time`;
export const TCP_CONNECT_TIME_METRIC = `${METRIC_PREFIX}tcp_connect.time`;
export const TLS_HANDSHAKE_TIME_METRIC = `${METRIC_PREFIX}tls_handshake.time`;
export const GOT_CONNECTION_TIME_METRIC = `${METRIC_PREFIX}got_connection.time`;
export const REQUEST_WRITTEN_TIME_METRIC = `${METRIC_PREFIX}request_written.time`;
export const FIRST_BYTE_TIME_METRIC = `${METRIC_PREFIX}response_first_byte.time`;
export const FULLY_READ_TIME_METRIC = `${METRIC_PREFIX}response_fully_read.time`;

export interface TraceDecoratorOptions {
  telemetry?: Telemetry;
  tracer?: Tracer;
}

/** technology, target_id ("" when unset) and lower-case method. */
export function requestTags(req: OutboundRequest): Tags {
  return {
    technology: "node",
    target_id: sanitizeMetricTagValue(req.meta.targetId ?? ""),
    method: req.method.toLowerCase(),
  };
}

/** Records `http.client.request.time` and a child span for every round trip. */
export function traceDecorator(opts: TraceDecoratorOptions = {}): TransportDecorator {
  return tracingDecorator(opts, false);
}

/**
 * Like {@link traceDecorator}, plus per-phase connection timings taken through a
 * ClientTrace and the time until the response body was fully read.
 */
export function extendedTraceDecorator(opts: TraceDecoratorOptions = {}): TransportDecorator {
  return tracingDecorator(opts, true);
}

function tracingDecorator(opts: TraceDecoratorOptions, extended: boolean): TransportDecorator {
  const telemetry = opts.telemetry ?? noopTelemetry;
  const tracer = opts.tracer ?? trace.getTracer("transit-http", VERSION);

  return (next) => ({
    async roundTrip(req) {
      const tags = requestTags(req);
      const start = performance.now();
      const segment = startSegment(tracer, req);

      let outgoing = segment?.req ?? req;
      if (extended) {
        const own = phaseTimings(telemetry, tags, start);
        const previous = outgoing.meta.clientTrace;
        outgoing = withMeta(outgoing, { clientTrace: previous ? composeClientTrace(previous, own) : own });
      }

      let res: OutboundResponse;
      try {
        res = await next.roundTrip(outgoing);
      } catch (err) {
        segment?.end(undefined, toError(err));
        telemetry.timing(REQUEST_TIME_METRIC, performance.now() - start, { ...tags, ...outcomeTags(undefined, err) });
        throw err;
      }

      segment?.end(res, undefined);
      const resultTags = { ...tags, ...outcomeTags(res, undefined) };
      telemetry.timing(REQUEST_TIME_METRIC, performance.now() - start, resultTags);

      if (extended) {
        finished(res.body, (err) => {
          const readTags = err ? { ...tags, ...outcomeTags(undefined, err) } : resultTags;
          telemetry.timing(FULLY_READ_TIME_METRIC, performance.now() - start, readTags);
        });
      }
      return res;
    },
  });
}

interface Segment {
  req: OutboundRequest;
  end(res: OutboundResponse | undefined, err: Error | undefined): void;
}

/** Child span of the span in the request's trace context; none when there is no such span. */
function startSegment(tracer: Tracer, req: OutboundRequest): Segment | undefined {
  const parent = req.meta.traceContext;
  if (!parent || !trace.getSpan(parent)) return undefined;

  const route = req.meta.endpointTemplate || req.meta.targetId;
  const span = tracer.startSpan(
    route ? `${req.method} ${route}` : `HTTP ${req.method}`,
    {
      kind: SpanKind.CLIENT,
      attributes: { [ATTR_HTTP_REQUEST_METHOD]: req.method, [ATTR_URL_FULL]: req.url },
    },
    parent
  );

  return {
    req: withMeta(req, { traceContext: trace.setSpan(parent, span) }),
    end(res, err) {
      if (res) span.setAttribute(ATTR_HTTP_RESPONSE_STATUS_CODE, res.status);
      if (err) {
        span.recordException(err);
        span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
      }
      span.end();
    },
  };
}

function phaseTimings(telemetry: Telemetry, tags: Tags, requestStart: number): ClientTrace {
  let dnsStart: number | undefined;
  let connectStart: number | undefined;
  let tlsStart: number | undefined;

  const since = (metric: string, from: number | undefined, extra: Tags) => {
    if (from === undefined) return;
    telemetry.timing(metric, performance.now() - from, { ...tags, ...extra });
  };

  return {
    dnsStart() {
      dnsStart = performance.now();
    },
    dnsDone(err) {
      since(DNS_TIME_METRIC, dnsStart, { status: phaseStatus(err) });
    },
    connectStart() {
      connectStart = performance.now();
    },
    connectDone(_network, _address, err) {
      since(TCP_CONNECT_TIME_METRIC, connectStart, { status: phaseStatus(err) });
    },
    tlsHandshakeStart() {
      tlsStart = performance.now();
    },
    tlsHandshakeDone(err) {
      since(TLS_HANDSHAKE_TIME_METRIC, tlsStart, { status: phaseStatus(err) });
    },
    gotConn(info) {
      since(GOT_CONNECTION_TIME_METRIC, requestStart, {
        reused: String(info.reused),
        was_idle: String(info.wasIdle),
      });
    },
    wroteRequest(err) {
      since(REQUEST_WRITTEN_TIME_METRIC, requestStart, { status: phaseStatus(err) });
    },
    gotFirstResponseByte() {
      since(FIRST_BYTE_TIME_METRIC, requestStart, {});
    },
  };
}
