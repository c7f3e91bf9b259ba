// src/dialer.ts
import { lookup as dnsLookup, type LookupAddress, type LookupOptions } from "node:dns";
import net from "node:net";
import tls from "node:tls";
import type { buildConnector } from "undici";
import { ConnectTimeoutError, TlsHandshakeTimeoutError } from "./errors.js";
import type { ClientTrace } from "./types.js";

export interface DialerOptions {
  /** Bounds DNS and the TCP connect. */
  timeoutMs: number;
  /** Bounds the TLS handshake, armed once TCP is connected. */
  tlsHandshakeTimeoutMs: number;
  keepAliveMs: number;
  tls?: tls.ConnectionOptions;
  /** Returns the ClientTrace of the request that triggered the dial, if any. */
  clientTrace?: () => ClientTrace | undefined;
}

/** Connection lifecycle callbacks; `closed` fires once for every `connected`. */
export interface DialerEvents {
  connected(network: string, address: string): void;
  closed(network: string, address: string): void;
}

const NETWORK = "tcp";

/**
 * undici connector that dials plain or TLS sockets, reports DNS/connect/TLS phases to
 * the request's ClientTrace and tells `events` when a connection opens and closes.
 * Failed dials are never reported as connected.
 */
export function createTracedConnector(opts: DialerOptions, events: DialerEvents): buildConnector.connector {
  return (options, callback) => {
    const secure = options.protocol === "https:";
    const port = Number(options.port) || (secure ? 443 : 80);
    const host = options.hostname;
    const address = `${host}:${port}`;
    const trace = opts.clientTrace?.();

    let settled = false;
    let connecting = false;
    let tcpConnected = false;

    const startConnect = (): void => {
      if (settled) return;
      connecting = true;
      trace?.connectStart?.(NETWORK, address);
    };
    // hostnames report connectStart once resolved; literal IPs skip the lookup
    const lookup = net.isIP(host) === 0 ? tracedLookup(trace, startConnect) : undefined;
    if (lookup === undefined) startConnect();

    const socket: net.Socket = secure
      ? tls.connect({
          ...opts.tls,
          host,
          port,
          servername: options.servername ?? (net.isIP(host) ? undefined : host),
          ALPNProtocols: ["http/1.1"],
          lookup,
        })
      : net.connect({ host, port, lookup });

    socket.setNoDelay(true);
    socket.setKeepAlive(true, opts.keepAliveMs);

    let timer = setTimeout(() => fail(new ConnectTimeoutError(address, opts.timeoutMs)), opts.timeoutMs);

    function fail(err: Error): void {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (tcpConnected) {
        if (secure) trace?.tlsHandshakeDone?.(err);
      } else if (connecting) {
        trace?.connectDone?.(NETWORK, address, err);
      }
      socket.destroy();
      callback(err, null);
    }

    function ready(): void {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.removeListener("error", fail);

      events.connected(NETWORK, address);
      socket.once("close", () => events.closed(NETWORK, address));
      callback(null, socket);
    }

    socket.once("error", fail);
    socket.once("connect", () => {
      tcpConnected = true;
      clearTimeout(timer);
      trace?.connectDone?.(NETWORK, address);
      if (!secure) {
        ready();
        return;
      }
      timer = setTimeout(
        () => fail(new TlsHandshakeTimeoutError(address, opts.tlsHandshakeTimeoutMs)),
        opts.tlsHandshakeTimeoutMs
      );
      trace?.tlsHandshakeStart?.();
    });
    if (secure) {
      socket.once("secureConnect", () => {
        trace?.tlsHandshakeDone?.();
        ready();
      });
    }
  };
}

/**
 * dns.lookup reporting to the trace, calling `resolved` after a successful lookup;
 * undefined (plain dns.lookup) when nobody listens.
 */
function tracedLookup(trace: ClientTrace | undefined, resolved: () => void): net.LookupFunction | undefined {
  if (trace === undefined || (!trace.dnsStart && !trace.dnsDone && !trace.connectStart)) return undefined;
  const t: ClientTrace = trace;

  return (hostname: string, options: LookupOptions, callback) => {
    t.dnsStart?.(hostname);
    dnsLookup(
      hostname,
      options,
      (err: NodeJS.ErrnoException | null, address: string | LookupAddress[], family?: number) => {
        t.dnsDone?.(err ?? undefined);
        if (!err) resolved();
        callback(err, address, family);
      }
    );
  };
}
