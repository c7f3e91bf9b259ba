// src/client.ts
import { finished } from "node:stream";
import type { Tracer } from "@opentelemetry/api";
import type { BackoffFunc } from "./backoff.js";
import { constantBackoff } from "./backoff.js";
import { drainBody } from "./body.js";
import { RollingWindowBreaker } from "./breaker.js";
import { LocalCache } from "./cache/localCache.js";
import { composeTransport } from "./chain.js";
import { loadConfig, type TransitConfig } from "./config.js";
import { cacheDecorator } from "./decorators/cache.js";
import { circuitBreakerDecorator, type BreakerCheckFunc, type BucketFunc } from "./decorators/circuitBreaker.js";
import { hookDecorator, type RequestHook, type ResponseHook } from "./decorators/hooks.js";
import { openTelemetryDecorator } from "./decorators/otel.js";
import { targetDecorator } from "./decorators/target.js";
import { extendedTraceDecorator, traceDecorator } from "./decorators/tracing.js";
import { userAgentDecorator } from "./decorators/userAgent.js";
import { forwardTracingHeadersHook, retryHeaderHook, retryMetricHook } from "./defaultHooks.js";
import { RequestTimeoutError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { PooledTransport, type PooledTransportOptions } from "./pooled.js";
import { RetryableClient, serverErrorsRetryPolicy, type CheckRetryFunc } from "./retry.js";
import type { ClientSnapshot } from "./snapshot.js";
import { noopTelemetry, type Telemetry } from "./telemetry.js";
import type {
  CacheStore,
  CircuitBreaker,
  HttpHeaders,
  OutboundRequest,
  OutboundResponse,
  Requester,
  Transport,
  TransportDecorator,
} from "./types.js";

export const DEFAULT_TIMEOUT_MS = 3000;
export const MAX_REDIRECTS = 10;
export const DEFAULT_POOL_NAME = "transit-default";

export interface ClientOptions {
  /** Per-attempt timeout, headers and body included. 0 disables it. */
  timeoutMs?: number;
  followRedirects?: boolean;
  /** Shared pool; when omitted the client creates one and closes it in close(). */
  transport?: PooledTransport;
  /** Settings for the pool the client creates; ignored with `transport`. */
  pool?: PooledTransportOptions;
  requestHooks?: RequestHook[];
  responseHooks?: ResponseHook[];
  cache?: CacheStore;
  circuitBreaker?: CircuitBreaker;
  breakerCheck?: BreakerCheckFunc;
  breakerBucket?: BucketFunc;
  enableClientTrace?: boolean;
  /** Stamped on requests that carry no target id of their own. */
  targetId?: string;
  telemetry?: Telemetry;
  tracer?: Tracer;
  logger?: Logger;
}

export interface RetryableClientBuildOptions extends ClientOptions {
  backoff?: BackoffFunc;
  checkRetry?: CheckRetryFunc;
}

/**
 * Decorates `base` in the default order, outermost first:
 * user-agent, target, cache, hooks, tracing, circuit breaker, OpenTelemetry span.
 */
export function buildTransport(base: Transport, opts: ClientOptions = {}): Transport {
  const telemetry = opts.telemetry ?? noopTelemetry;
  const logger = opts.logger;
  const chain: TransportDecorator[] = [userAgentDecorator()];

  if (opts.targetId) chain.push(targetDecorator(opts.targetId));
  if (opts.cache) chain.push(cacheDecorator(opts.cache, { logger }));
  chain.push(hookDecorator(opts.requestHooks ?? [], opts.responseHooks ?? [], { logger }));
  chain.push(
    opts.enableClientTrace
      ? extendedTraceDecorator({ telemetry, tracer: opts.tracer })
      : traceDecorator({ telemetry, tracer: opts.tracer })
  );
  if (opts.circuitBreaker) {
    chain.push(
      circuitBreakerDecorator(opts.circuitBreaker, {
        check: opts.breakerCheck,
        bucket: opts.breakerBucket,
        telemetry,
        logger,
      })
    );
  }
  chain.push(openTelemetryDecorator({ tracer: opts.tracer }));

  return composeTransport(chain, base);
}

export class HttpClient implements Requester {
  readonly transport: Transport;
  private readonly pool: PooledTransport;
  private readonly ownsPool: boolean;
  private readonly breaker?: CircuitBreaker;
  private readonly timeoutMs: number;
  private readonly followRedirects: boolean;
  private readonly log: Logger;

  constructor(opts: ClientOptions = {}) {
    if (opts.timeoutMs !== undefined && (!Number.isFinite(opts.timeoutMs) || opts.timeoutMs < 0)) {
      throw new Error(`timeoutMs must be >= 0 (got ${opts.timeoutMs})`);
    }
    this.ownsPool = opts.transport === undefined;
    this.pool = opts.transport ?? new PooledTransport(DEFAULT_POOL_NAME, { logger: opts.logger, ...opts.pool });
    this.transport = buildTransport(this.pool, opts);
    this.breaker = opts.circuitBreaker;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.followRedirects = opts.followRedirects ?? false;
    this.log = opts.logger ?? createLogger("client");
  }

  async do(req: OutboundRequest): Promise<OutboundResponse> {
    let current = req;
    for (let redirects = 0; ; redirects++) {
      const res = await this.send(current);
      if (!this.followRedirects) return res;

      const next = await redirectRequest(current, res);
      if (!next) return res;
      if (redirects >= MAX_REDIRECTS) {
        res.body.destroy();
        throw new Error(`stopped after ${MAX_REDIRECTS} redirects`);
      }

      await drainBody(res.body);
      this.log.debug({ from: current.url, to: next.url, status: res.status }, "following redirect");
      current = next;
    }
  }

  snapshot(): ClientSnapshot {
    return {
      connections: this.pool.stats(),
      breakers: this.breaker instanceof RollingWindowBreaker ? this.breaker.snapshot() : [],
    };
  }

  /** Closes the pool when this client created it; a shared pool is left alone. */
  async close(): Promise<void> {
    if (this.ownsPool) await this.pool.close();
  }

  private async send(caller: OutboundRequest): Promise<OutboundResponse> {
    // hooks mutate headers; the caller's object stays as it was
    const req: OutboundRequest = { ...caller, headers: { ...caller.headers } };
    if (this.timeoutMs === 0) return this.transport.roundTrip(req);

    const timeoutMs = this.timeoutMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new RequestTimeoutError(timeoutMs)), timeoutMs);
    timer.unref();
    const signal = req.signal ? AbortSignal.any([req.signal, controller.signal]) : controller.signal;

    let res: OutboundResponse;
    try {
      res = await this.transport.roundTrip({ ...req, signal });
    } catch (err) {
      clearTimeout(timer);
      throw err;
    }
    // the timeout keeps covering the body until it is consumed or discarded
    finished(res.body, () => clearTimeout(timer));
    return res;
  }
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/**
 * The request to send after a redirect, or undefined to hand the 3xx to the caller
 * (no Location, or a body that cannot be replayed).
 */
async function redirectRequest(req: OutboundRequest, res: OutboundResponse): Promise<OutboundRequest | undefined> {
  if (!REDIRECT_STATUSES.has(res.status)) return undefined;
  const location = res.headers["location"];
  if (!location) return undefined;

  const target = new URL(location, req.url);
  const headers: HttpHeaders = { ...req.headers };
  if (target.host !== new URL(req.url).host) {
    delete headers["authorization"];
    delete headers["cookie"];
  }

  const toGet = res.status === 303 || ((res.status === 301 || res.status === 302) && req.method === "POST");
  if (toGet) {
    delete headers["content-length"];
    delete headers["content-type"];
    return {
      method: req.method === "HEAD" ? "HEAD" : "GET",
      url: target.toString(),
      headers,
      ...(req.signal ? { signal: req.signal } : {}),
      ...(req.deadline !== undefined ? { deadline: req.deadline } : {}),
      meta: req.meta,
    };
  }

  if (req.body === undefined) return { ...req, url: target.toString(), headers };
  if (!req.getBody) return undefined;
  return { ...req, url: target.toString(), headers, body: await req.getBody() };
}

/** A client with the forwarded tracing headers hook installed. */
export function createClient(opts: ClientOptions = {}): HttpClient {
  const telemetry = opts.telemetry ?? noopTelemetry;
  return new HttpClient({
    ...opts,
    requestHooks: [forwardTracingHeadersHook(telemetry), ...(opts.requestHooks ?? [])],
  });
}

/** RetryableClient over an HttpClient it owns; `close()` and `snapshot()` reach the client. */
export class RetryableHttpClient extends RetryableClient {
  constructor(
    readonly client: HttpClient,
    opts: { retryMax: number; backoff?: BackoffFunc; checkRetry?: CheckRetryFunc; logger?: Logger }
  ) {
    super(client, opts);
  }

  snapshot(): ClientSnapshot {
    return this.client.snapshot();
  }

  close(): Promise<void> {
    return this.client.close();
  }
}

/**
 * A retrying client: on top of {@link createClient} it stamps `x-retry` on retries and
 * counts their outcomes. Waits default to none between attempts.
 */
export function createRetryableClient(retryMax: number, opts: RetryableClientBuildOptions = {}): RetryableHttpClient {
  const telemetry = opts.telemetry ?? noopTelemetry;
  const client = new HttpClient({
    ...opts,
    requestHooks: [forwardTracingHeadersHook(telemetry), retryHeaderHook, ...(opts.requestHooks ?? [])],
    responseHooks: [retryMetricHook(telemetry), ...(opts.responseHooks ?? [])],
  });
  return new RetryableHttpClient(client, {
    retryMax,
    backoff: opts.backoff ?? constantBackoff(0),
    checkRetry: opts.checkRetry ?? serverErrorsRetryPolicy(),
    logger: opts.logger,
  });
}

/** Maps environment configuration onto client options. */
export function clientOptionsFromConfig(config: TransitConfig): ClientOptions {
  return {
    timeoutMs: config.timeoutMs,
    enableClientTrace: config.enableClientTrace,
    pool: { dialTimeoutMs: config.dialTimeoutMs },
    ...(config.cacheMaxMiB > 0 ? { cache: new LocalCache({ maxSizeMiB: config.cacheMaxMiB }) } : {}),
  };
}

/** A retrying client configured from the environment (see loadConfig). */
export function clientFromConfig(
  config: TransitConfig = loadConfig(),
  opts: RetryableClientBuildOptions = {}
): RetryableHttpClient {
  return createRetryableClient(config.retryMax, { ...clientOptionsFromConfig(config), ...opts });
}
