// src/utils/undiciChannels.ts
import { AsyncLocalStorage } from "node:async_hooks";
import { subscribe } from "node:diagnostics_channel";
import { Socket } from "node:net";
import type { ClientTrace } from "../types.js";

/**
 * The ClientTrace of the request being dispatched. undici creates its request
 * object synchronously inside request(), so the store is visible to
 * "undici:request:create" subscribers and to the connector.
 */
export const clientTraceStorage = new AsyncLocalStorage<ClientTrace>();

const traces = new WeakMap<object, ClientTrace>();
const socketRequests = new WeakMap<Socket, number>();

let subscribed = false;

/** Idempotent; called by every PooledTransport constructor. */
export function subscribeUndiciChannels(): void {
  if (subscribed) return;
  subscribed = true;

  subscribe("undici:request:create", (message) => {
    const request = objectField(message, "request");
    const trace = clientTraceStorage.getStore();
    if (request && trace) traces.set(request, trace);
  });

  subscribe("undici:client:sendHeaders", (message) => {
    const request = objectField(message, "request");
    const socket = objectField(message, "socket");
    if (!request || !(socket instanceof Socket)) return;

    const served = socketRequests.get(socket) ?? 0;
    socketRequests.set(socket, served + 1);
    // undici only hands out connected sockets with nothing in flight, so a reused one was idle
    traces.get(request)?.gotConn?.({ reused: served > 0, wasIdle: served > 0 });
  });

  subscribe("undici:request:bodySent", (message) => {
    const request = objectField(message, "request");
    if (request) traces.get(request)?.wroteRequest?.();
  });

  subscribe("undici:request:headers", (message) => {
    const request = objectField(message, "request");
    if (request) traces.get(request)?.gotFirstResponseByte?.();
  });
}

function objectField(message: unknown, key: string): object | undefined {
  if (typeof message !== "object" || message === null) return undefined;
  const value: unknown = Reflect.get(message, key);
  return typeof value === "object" && value !== null ? value : undefined;
}
