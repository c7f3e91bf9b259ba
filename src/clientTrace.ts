import type { ClientTrace, GotConnInfo } from "./types.js";

/** Calls `first`'s hooks, then `second`'s. */
export function composeClientTrace(first: ClientTrace, second: ClientTrace): ClientTrace {
  return {
    dnsStart(host: string) {
      first.dnsStart?.(host);
      second.dnsStart?.(host);
    },
    dnsDone(err?: Error) {
      first.dnsDone?.(err);
      second.dnsDone?.(err);
    },
    connectStart(network: string, address: string) {
      first.connectStart?.(network, address);
      second.connectStart?.(network, address);
    },
    connectDone(network: string, address: string, err?: Error) {
      first.connectDone?.(network, address, err);
      second.connectDone?.(network, address, err);
    },
    tlsHandshakeStart() {
      first.tlsHandshakeStart?.();
      second.tlsHandshakeStart?.();
    },
    tlsHandshakeDone(err?: Error) {
      first.tlsHandshakeDone?.(err);
      second.tlsHandshakeDone?.(err);
    },
    gotConn(info: GotConnInfo) {
      first.gotConn?.(info);
      second.gotConn?.(info);
    },
    wroteRequest(err?: Error) {
      first.wroteRequest?.(err);
      second.wroteRequest?.(err);
    },
    gotFirstResponseByte() {
      first.gotFirstResponseByte?.();
      second.gotFirstResponseByte?.();
    },
  };
}
