import {
  context,
  defaultTextMapSetter,
  propagation,
  SpanKind,
  SpanStatusCode,
  trace,
  type TextMapPropagator,
  type Tracer,
} from "@opentelemetry/api";
import {
  ATTR_HTTP_REQUEST_METHOD,
  ATTR_HTTP_RESPONSE_STATUS_CODE,
  ATTR_SERVER_ADDRESS,
  ATTR_SERVER_PORT,
  ATTR_URL_FULL,
} from "@opentelemetry/semantic-conventions";
import { toError } from "../errors.js";
import type { HttpHeaders, TransportDecorator } from "../types.js";
import { VERSION } from "../version.js";

export interface OpenTelemetryDecoratorOptions {
  tracer?: Tracer;
  /** Defaults to the globally registered propagator. */
  propagator?: TextMapPropagator;
}

/**
 * Wraps every round trip in a CLIENT span, child of the request's trace context (or
 * the active one), and injects the propagation headers into the outgoing request.
 */
export function openTelemetryDecorator(opts: OpenTelemetryDecoratorOptions = {}): TransportDecorator {
  const tracer = opts.tracer ?? trace.getTracer("transit-http", VERSION);

  return (next) => ({
    async roundTrip(req) {
      const url = new URL(req.url);
      const parent = req.meta.traceContext ?? context.active();
      const span = tracer.startSpan(
        `HTTP ${req.method}`,
        {
          kind: SpanKind.CLIENT,
          attributes: {
            [ATTR_HTTP_REQUEST_METHOD]: req.method,
            [ATTR_URL_FULL]: req.url,
            [ATTR_SERVER_ADDRESS]: url.hostname,
            [ATTR_SERVER_PORT]: Number(url.port) || (url.protocol === "https:" ? 443 : 80),
          },
        },
        parent
      );
      const ctx = trace.setSpan(parent, span);

      const headers: HttpHeaders = { ...req.headers };
      if (opts.propagator) opts.propagator.inject(ctx, headers, defaultTextMapSetter);
      else propagation.inject(ctx, headers);

      try {
        const res = await next.roundTrip({ ...req, headers, meta: req.meta.with({ traceContext: ctx }) });
        span.setAttribute(ATTR_HTTP_RESPONSE_STATUS_CODE, res.status);
        span.setStatus({ code: SpanStatusCode.OK });
        return res;
      } catch (err) {
        const e = toError(err);
        span.recordException(e);
        span.setStatus({ code: SpanStatusCode.ERROR, message: e.message });
        throw err;
      } finally {
        span.end();
      }
    },
  });
}
