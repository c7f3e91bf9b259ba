// src/pooled.ts
import type tls from "node:tls";
import { Agent } from "undici";
import { createTracedConnector } from "./dialer.js";
import { doHttpRequest } from "./http.js";
import { createLogger, type Logger } from "./logger.js";
import type { OutboundRequest, OutboundResponse, Transport } from "./types.js";
import { clientTraceStorage, subscribeUndiciChannels } from "./utils/undiciChannels.js";

export const DEFAULT_DIAL_TIMEOUT_MS = 300;
export const DEFAULT_TLS_HANDSHAKE_TIMEOUT_MS = 10_000;
export const DEFAULT_KEEP_ALIVE_MS = 15_000;
export const DEFAULT_IDLE_TIMEOUT_MS = 90_000;

export interface PooledTransportOptions {
  /** DNS plus TCP connect; the TLS handshake has its own budget. */
  dialTimeoutMs?: number;
  tlsHandshakeTimeoutMs?: number;
  /** TCP keep-alive probe delay. */
  keepAliveMs?: number;
  /** How long an idle pooled connection is kept before undici closes it. */
  idleTimeoutMs?: number;
  headersTimeoutMs?: number;
  bodyTimeoutMs?: number;
  /** Max connections per origin; unlimited when omitted. */
  connections?: number;
  tls?: tls.ConnectionOptions;
  logger?: Logger;
}

/**
 * Base transport over an undici connection pool that keeps a live count of open
 * connections per remote address ("tcp:host:port"). A count reaches 0 once every
 * connection to that address has closed, and dials that fail are never counted.
 */
export class PooledTransport implements Transport {
  readonly name: string;
  private readonly agent: Agent;
  private readonly counts = new Map<string, number>();
  private readonly log: Logger;

  constructor(name: string, opts: PooledTransportOptions = {}) {
    this.name = name;
    this.log = opts.logger ?? createLogger("pooled-transport");
    subscribeUndiciChannels();

    const connect = createTracedConnector(
      {
        timeoutMs: opts.dialTimeoutMs ?? DEFAULT_DIAL_TIMEOUT_MS,
        tlsHandshakeTimeoutMs: opts.tlsHandshakeTimeoutMs ?? DEFAULT_TLS_HANDSHAKE_TIMEOUT_MS,
        keepAliveMs: opts.keepAliveMs ?? DEFAULT_KEEP_ALIVE_MS,
        tls: opts.tls,
        clientTrace: () => clientTraceStorage.getStore(),
      },
      {
        connected: (network, address) => this.adjust(`${network}:${address}`, 1),
        closed: (network, address) => this.adjust(`${network}:${address}`, -1),
      }
    );

    this.agent = new Agent({
      connect,
      keepAliveTimeout: opts.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS,
      headersTimeout: opts.headersTimeoutMs,
      bodyTimeout: opts.bodyTimeoutMs,
      connections: opts.connections ?? null,
    });
  }

  roundTrip(req: OutboundRequest): Promise<OutboundResponse> {
    return doHttpRequest(this.agent, req);
  }

  /** Snapshot of open connections keyed by "tcp:host:port". */
  stats(): Record<string, number> {
    return Object.fromEntries(this.counts);
  }

  /** Waits for in-flight requests, then closes every connection. */
  close(): Promise<void> {
    return this.agent.close();
  }

  destroy(): Promise<void> {
    return this.agent.destroy();
  }

  private adjust(key: string, delta: number): void {
    const next = (this.counts.get(key) ?? 0) + delta;
    this.counts.set(key, next);
    this.log.trace({ pool: this.name, address: key, connections: next }, "connection count changed");
  }
}
