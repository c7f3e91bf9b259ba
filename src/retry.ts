// src/retry.ts
import { EventEmitter } from "node:events";
import { Readable } from "node:stream";
import { constantBackoff, retryAfterMs, type BackoffFunc } from "./backoff.js";
import { drainBody } from "./body.js";
import { abortReason, BodyRewindError, toError } from "./errors.js";
import type { RetryExhaustedEvent, RetryScheduledEvent } from "./events.js";
import { createLogger, type Logger } from "./logger.js";
import type { OutboundRequest, OutboundResponse, Requester } from "./types.js";
import { sleep } from "./utils/sleep.js";

/** Per-attempt view handed to the retry policy. */
export interface RetryContext {
  /** Zero-based attempt that just completed. */
  attempt: number;
  request: OutboundRequest;
  signal?: AbortSignal;
}

export interface RetryDecision {
  retry: boolean;
  /** Replaces the attempt's error when the engine gives up. */
  error?: Error;
}

export type CheckRetryFunc = (
  ctx: RetryContext,
  res: OutboundResponse | undefined,
  err: Error | undefined
) => RetryDecision | Promise<RetryDecision>;

export interface RetryableClientOptions {
  /** Retries after the first attempt; 0 sends exactly once. */
  retryMax: number;
  backoff?: BackoffFunc;
  checkRetry?: CheckRetryFunc;
  logger?: Logger;
}

/**
 * Retries on transport errors and on 5xx other than 501 (and status 0). Once the
 * caller's signal aborted nothing is retried and its reason becomes the error.
 */
export function serverErrorsRetryPolicy(): CheckRetryFunc {
  return (ctx, res, err) => {
    if (ctx.signal?.aborted) return { retry: false, error: abortReason(ctx.signal) };
    if (err) return { retry: true, error: err };
    if (res && (res.status === 0 || (res.status >= 500 && res.status !== 501))) return { retry: true };
    return { retry: false };
  };
}

export const noRetryPolicy: CheckRetryFunc = (_ctx, _res, err) => ({ retry: false, error: err });

/**
 * Executes a request through `inner`, retrying per `checkRetry` with waits from
 * `backoff` (or the server's Retry-After on 429/503).
 *
 * Streamed request bodies must come with `getBody`; every attempt after the first
 * sends a fresh body from it.
 *
 * Emits "retry:scheduled" before each wait and "retry:exhausted" when retries run out.
 */
export class RetryableClient extends EventEmitter implements Requester {
  readonly retryMax: number;
  private readonly backoff: BackoffFunc;
  private readonly checkRetry: CheckRetryFunc;
  private readonly log: Logger;

  constructor(
    private readonly inner: Requester,
    opts: RetryableClientOptions
  ) {
    super();
    if (!Number.isInteger(opts.retryMax) || opts.retryMax < 0) {
      throw new Error(`retryMax must be a non-negative integer (got ${opts.retryMax})`);
    }
    this.retryMax = opts.retryMax;
    this.backoff = opts.backoff ?? constantBackoff(0);
    this.checkRetry = opts.checkRetry ?? serverErrorsRetryPolicy();
    this.log = opts.logger ?? createLogger("retry");
  }

  async do(request: OutboundRequest): Promise<OutboundResponse> {
    for (let attempt = 0; ; attempt++) {
      const req = await attemptRequest(request, attempt);

      let res: OutboundResponse | undefined;
      let err: Error | undefined;
      try {
        res = await this.inner.do(req);
      } catch (e) {
        err = toError(e);
      }

      const decision = await this.checkRetry({ attempt, request, signal: request.signal }, res, err);
      if (!decision.retry) return settle(res, decision.error ?? err);

      if (attempt >= this.retryMax) {
        const event: RetryExhaustedEvent = { ...describe(request, res, err), attempts: attempt + 1 };
        this.emit("retry:exhausted", event);
        this.log.debug(event, "giving up after retries");
        return settle(res, err);
      }

      if (res && !err) {
        const drained = await drainBody(res.body);
        if (drained.error) this.log.debug({ err: drained.error, url: request.url }, "draining response body failed");
      }

      const waitMs = this.waitFor(attempt, res);
      if (request.deadline !== undefined && request.deadline - Date.now() <= waitMs) {
        return settle(res, err);
      }

      const event: RetryScheduledEvent = { ...describe(request, res, err), attempt, waitMs };
      this.emit("retry:scheduled", event);
      this.log.debug(event, "retrying request");

      await sleep(waitMs, request.signal);
    }
  }

  private waitFor(attempt: number, res: OutboundResponse | undefined): number {
    if (res && (res.status === 429 || res.status === 503)) {
      const header = res.headers["retry-after"];
      const fromServer = header === undefined ? undefined : retryAfterMs(header);
      if (fromServer !== undefined) return fromServer;
    }
    return this.backoff(attempt);
  }
}

async function attemptRequest(request: OutboundRequest, attempt: number): Promise<OutboundRequest> {
  const req: OutboundRequest = { ...request, headers: { ...request.headers } };
  if (attempt === 0) return req;

  req.meta = request.meta.with({ retryAttempt: attempt });
  if (request.getBody) {
    try {
      req.body = await request.getBody();
    } catch (cause) {
      throw new BodyRewindError("request body could not be rewound for retry", { cause });
    }
  } else if (request.body instanceof Readable) {
    throw new BodyRewindError("streamed request body has no getBody and cannot be replayed");
  }
  return req;
}

function settle(res: OutboundResponse | undefined, err: Error | undefined): OutboundResponse {
  if (err) {
    res?.body.destroy();
    throw err;
  }
  if (!res) throw new Error("request produced neither a response nor an error");
  return res;
}

function describe(
  request: OutboundRequest,
  res: OutboundResponse | undefined,
  err: Error | undefined
): { method: OutboundRequest["method"]; url: string; status?: number; errorName?: string } {
  return {
    method: request.method,
    url: request.url,
    ...(res ? { status: res.status } : {}),
    ...(err ? { errorName: err.name } : {}),
  };
}
