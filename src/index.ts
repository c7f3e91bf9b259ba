export * from "./types.js";
export * from "./errors.js";
export * from "./events.js";
export type { BreakerSnapshot, ClientSnapshot } from "./snapshot.js";

export {
  RequestMeta,
  type RequestMetaFields,
  retryCount,
  withDeadline,
  withEndpointTemplate,
  withForwardedHeaders,
  withMeta,
  withTargetId,
} from "./meta.js";
export {
  materializeBody,
  newRequest,
  type BodyFactory,
  type MaterializedBody,
  type RawBody,
  type RequestInit,
} from "./request.js";
export {
  bufferResponseBody,
  drainBody,
  DRAIN_LIMIT_BYTES,
  readBody,
  readJson,
  readText,
  type DrainResult,
} from "./body.js";

export { composeTransport, TransportChain, transportFunc } from "./chain.js";
export { composeClientTrace } from "./clientTrace.js";
export { PooledTransport, type PooledTransportOptions } from "./pooled.js";
export { ConnectionPoolCollector } from "./poolCollector.js";

export { hookDecorator, type RequestHook, type ResponseHook } from "./decorators/hooks.js";
export { cacheDecorator, cacheKey, type CacheDecoratorOptions } from "./decorators/cache.js";
export { LocalCache, type LocalCacheOptions } from "./cache/localCache.js";
export {
  circuitBreakerDecorator,
  defaultBreakerCheck,
  defaultBucket,
  type BreakerCheckFunc,
  type BucketFunc,
} from "./decorators/circuitBreaker.js";
export { RollingWindowBreaker, DEFAULT_BREAKER_OPTIONS, type BreakerDecision } from "./breaker.js";
export { traceDecorator, extendedTraceDecorator, type TraceDecoratorOptions } from "./decorators/tracing.js";
export { openTelemetryDecorator, type OpenTelemetryDecoratorOptions } from "./decorators/otel.js";
export { targetDecorator } from "./decorators/target.js";
export { userAgentDecorator } from "./decorators/userAgent.js";
export { forwardTracingHeadersHook, retryHeaderHook, retryMetricHook } from "./defaultHooks.js";

export {
  RetryableClient,
  noRetryPolicy,
  serverErrorsRetryPolicy,
  type CheckRetryFunc,
  type RetryableClientOptions,
  type RetryContext,
  type RetryDecision,
} from "./retry.js";
export {
  constantBackoff,
  exponentialBackoff,
  linearJitterBackoff,
  retryAfterMs,
  type BackoffFunc,
} from "./backoff.js";

export {
  buildTransport,
  clientFromConfig,
  clientOptionsFromConfig,
  createClient,
  createRetryableClient,
  HttpClient,
  RetryableHttpClient,
  type ClientOptions,
  type RetryableClientBuildOptions,
} from "./client.js";

export { loadConfig, type TransitConfig } from "./config.js";
export { createLogger, type Logger } from "./logger.js";
export { noopTelemetry, sanitizeMetricTagValue, type Tags, type Telemetry } from "./telemetry.js";
export { PrometheusTelemetry, type PrometheusTelemetryOptions } from "./prometheus.js";
export { USER_AGENT, VERSION } from "./version.js";
