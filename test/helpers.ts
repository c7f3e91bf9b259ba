// test/helpers.ts
import http from "node:http";
import { Readable } from "node:stream";
import { RequestMeta } from "../src/meta.js";
import type { Tags, Telemetry } from "../src/telemetry.js";
import type { HttpHeaders, HttpMethod, OutboundRequest, OutboundResponse, Requester, Transport } from "../src/types.js";

export interface MetricRecord {
  kind: "count" | "timing" | "histogram" | "gauge";
  name: string;
  value: number;
  tags: Tags;
}

export class RecordingTelemetry implements Telemetry {
  readonly records: MetricRecord[] = [];

  incr(name: string, tags: Tags = {}): void {
    this.count(name, 1, tags);
  }
  count(name: string, value: number, tags: Tags = {}): void {
    this.records.push({ kind: "count", name, value, tags });
  }
  timing(name: string, durationMs: number, tags: Tags = {}): void {
    this.records.push({ kind: "timing", name, value: durationMs, tags });
  }
  histogram(name: string, value: number, tags: Tags = {}): void {
    this.records.push({ kind: "histogram", name, value, tags });
  }
  gauge(name: string, value: number, tags: Tags = {}): void {
    this.records.push({ kind: "gauge", name, value, tags });
  }

  named(name: string): MetricRecord[] {
    return this.records.filter((r) => r.name === name);
  }

  names(): string[] {
    return this.records.map((r) => r.name);
  }
}

export function requestOf(url: string, method: HttpMethod = "GET", headers: HttpHeaders = {}): OutboundRequest {
  return { method, url, headers: { ...headers }, meta: RequestMeta.empty() };
}

export function fakeResponse(status: number, body: string = "", headers: HttpHeaders = {}): OutboundResponse {
  return { status, headers: { ...headers }, body: Readable.from([Buffer.from(body)]) };
}

export type Outcome = OutboundResponse | Error | ((req: OutboundRequest) => OutboundResponse | Promise<OutboundResponse>);

/**
 * Replays `outcomes` in order (the last one repeats) and records every request.
 * Works both as a Transport and as a Requester.
 */
export class ScriptedTransport implements Transport, Requester {
  readonly requests: OutboundRequest[] = [];

  constructor(private readonly outcomes: Outcome[]) {}

  get calls(): number {
    return this.requests.length;
  }

  async roundTrip(req: OutboundRequest): Promise<OutboundResponse> {
    const outcome = this.outcomes[Math.min(this.requests.length, this.outcomes.length - 1)];
    this.requests.push(req);
    if (outcome instanceof Error) throw outcome;
    if (typeof outcome === "function") return outcome(req);
    return outcome;
  }

  do(req: OutboundRequest): Promise<OutboundResponse> {
    return this.roundTrip(req);
  }
}

export function startServer(handler: (req: http.IncomingMessage, res: http.ServerResponse) => void) {
  return new Promise<{ server: http.Server; url: string; port: number }>((resolve) => {
    const server = http.createServer(handler);
    server.listen(0, "127.0.0.1", () => {
      const addr = server.address();
      if (addr && typeof addr === "object") {
        resolve({ server, url: `http://127.0.0.1:${addr.port}`, port: addr.port });
      }
    });
  });
}

export function closeServer(server: http.Server): Promise<void> {
  server.closeAllConnections();
  return new Promise<void>((r) => server.close(() => r()));
}
