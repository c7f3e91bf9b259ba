import type { Context } from "@opentelemetry/api";
import type { ClientTrace, OutboundRequest } from "./types.js";

export interface RequestMetaFields {
  /** Low-cardinality name of the logical destination, used for metrics and breaker buckets. */
  targetId?: string;
  /** Route template such as "/users/{id}", used when no target id is set. */
  endpointTemplate?: string;
  retryAttempt?: number;
  forwardedHeaders?: Readonly<Record<string, string>>;
  clientTrace?: ClientTrace;
  traceContext?: Context;
}

/**
 * Request-scoped metadata travelling alongside a request through the transport chain.
 * Immutable: decorators derive a new bag with `with()` instead of mutating a shared one.
 */
export class RequestMeta {
  private static readonly EMPTY = new RequestMeta({});

  private constructor(private readonly fields: Readonly<RequestMetaFields>) {}

  static empty(): RequestMeta {
    return RequestMeta.EMPTY;
  }

  static of(fields: RequestMetaFields): RequestMeta {
    return new RequestMeta({ ...fields });
  }

  get targetId(): string | undefined {
    return this.fields.targetId;
  }

  get endpointTemplate(): string | undefined {
    return this.fields.endpointTemplate;
  }

  /** 0 for the first attempt. */
  get retryAttempt(): number {
    return this.fields.retryAttempt ?? 0;
  }

  get forwardedHeaders(): Readonly<Record<string, string>> {
    return this.fields.forwardedHeaders ?? {};
  }

  get clientTrace(): ClientTrace | undefined {
    return this.fields.clientTrace;
  }

  get traceContext(): Context | undefined {
    return this.fields.traceContext;
  }

  with(patch: RequestMetaFields): RequestMeta {
    return new RequestMeta({ ...this.fields, ...patch });
  }
}

export function withMeta(req: OutboundRequest, patch: RequestMetaFields): OutboundRequest {
  return { ...req, meta: req.meta.with(patch) };
}

export function withTargetId(req: OutboundRequest, targetId: string): OutboundRequest {
  return withMeta(req, { targetId });
}

export function withEndpointTemplate(req: OutboundRequest, endpointTemplate: string): OutboundRequest {
  return withMeta(req, { endpointTemplate });
}

export function withForwardedHeaders(req: OutboundRequest, headers: Record<string, string>): OutboundRequest {
  const forwardedHeaders: Record<string, string> = {};
  for (const [k, v] of Object.entries(headers)) forwardedHeaders[k.toLowerCase()] = v;
  return withMeta(req, { forwardedHeaders });
}

/** Tells whether this request is a retry. 0 means first attempt. */
export function retryCount(req: OutboundRequest): number {
  return req.meta.retryAttempt;
}

/**
 * Bounds the request by `timeoutMs` from now: records the deadline for the retry engine and
 * aborts the request signal when it passes.
 */
export function withDeadline(req: OutboundRequest, timeoutMs: number, nowMs: number = Date.now()): OutboundRequest {
  const deadline = nowMs + timeoutMs;
  const timeout = AbortSignal.timeout(Math.max(0, timeoutMs));
  const signal = req.signal ? AbortSignal.any([req.signal, timeout]) : timeout;
  return {
    ...req,
    signal,
    deadline: req.deadline !== undefined ? Math.min(req.deadline, deadline) : deadline,
  };
}
