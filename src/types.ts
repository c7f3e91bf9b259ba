import type { Readable } from "node:stream";
import type { RequestMeta } from "./meta.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD" | "OPTIONS";

/** Header names are lower-case; repeated values are joined with ", ". */
export type HttpHeaders = Record<string, string>;

/** What undici can put on the wire as a request body. */
export type RequestBody = string | Uint8Array | Readable;

/** Replays a request body from the beginning. */
export type GetBodyFunc = () => Promise<RequestBody>;

export interface OutboundRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: RequestBody;

  /**
   * Rewind factory. The retry engine calls it for every attempt after the first one.
   * A streamed `body` without `getBody` cannot be retried.
   */
  getBody?: GetBodyFunc;
  contentLength?: number;

  signal?: AbortSignal;
  /** Absolute deadline in epoch millis; the retry engine never waits past it. */
  deadline?: number;

  meta: RequestMeta;
}

export interface OutboundResponse {
  status: number;
  statusText?: string;
  headers: HttpHeaders;
  // single-use; hooks that need the bytes replace it (see bufferResponseBody)
  body: Readable;
}

/** Executes exactly one HTTP exchange. Transport errors reject. */
export interface Transport {
  roundTrip(req: OutboundRequest): Promise<OutboundResponse>;
}

export type TransportDecorator = (next: Transport) => Transport;

/** Anything that can execute a request: clients, retry engines, test doubles. */
export interface Requester {
  do(req: OutboundRequest): Promise<OutboundResponse>;
}

export interface GotConnInfo {
  reused: boolean;
  wasIdle: boolean;
}

/**
 * Low-level connection lifecycle hooks fired by the pooled transport.
 * DNS, connect and TLS hooks only fire for new connections.
 */
export interface ClientTrace {
  dnsStart?(host: string): void;
  dnsDone?(err?: Error): void;
  connectStart?(network: string, address: string): void;
  connectDone?(network: string, address: string, err?: Error): void;
  tlsHandshakeStart?(): void;
  tlsHandshakeDone?(err?: Error): void;
  gotConn?(info: GotConnInfo): void;
  wroteRequest?(err?: Error): void;
  gotFirstResponseByte?(): void;
}

export type BreakerState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface BreakerAdmission {
  allowed: boolean;
  /** Hint for how long a denied bucket stays closed to traffic. */
  retryAfterMs?: number;
  success(): void;
  failure(): void;
}

/** Bucket-keyed admission gate. Implementations own the breaker algorithm. */
export interface CircuitBreaker {
  allow(bucket: string): BreakerAdmission;
}

export interface BreakerOptions {
  windowSize: number;          // e.g. 50
  minRequests: number;         // e.g. 20
  failureThreshold: number;    // 0..1 (e.g. 0.5)
  cooldownMs: number;          // e.g. 5000
  halfOpenProbeCount: number;  // e.g. 3
}

/** Key-value store behind the cache decorator. Eviction is the store's business. */
export interface CacheStore {
  get(key: string): Promise<Uint8Array | undefined>;
  set(key: string, value: Uint8Array): Promise<void>;
  delete(key: string): Promise<void>;
}
