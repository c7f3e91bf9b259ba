import { Gauge, type Registry } from "prom-client";
import type { PooledTransport } from "./pooled.js";

export const CONN_POOLS_METRIC = "http_client_conn_pools";

/**
 * Exposes the open connection counts of registered pools as a gauge labelled by pool
 * name and address. Counts are read at scrape time.
 */
export class ConnectionPoolCollector {
  private readonly pools = new Map<string, PooledTransport>();

  constructor(registry: Registry, metricName: string = CONN_POOLS_METRIC) {
    const pools = this.pools;
    new Gauge({
      name: metricName,
      help: "Open connections per pooled transport and remote address",
      labelNames: ["pool", "address"] as const,
      registers: [registry],
      collect() {
        this.reset();
        for (const [pool, transport] of pools) {
          for (const [address, count] of Object.entries(transport.stats())) {
            this.set({ pool, address }, count);
          }
        }
      },
    });
  }

  /** A pool registered under an existing name replaces the previous one. */
  register(transport: PooledTransport): void {
    this.pools.set(transport.name, transport);
  }

  unregister(name: string): void {
    this.pools.delete(name);
  }
}
