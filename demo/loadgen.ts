// demo/loadgen.ts
import { RollingWindowBreaker } from "../src/breaker.js";
import { LocalCache } from "../src/cache/localCache.js";
import { createRetryableClient } from "../src/client.js";
import { CircuitOpenError, isTimeoutError } from "../src/errors.js";
import type { BreakerStateEvent, RetryExhaustedEvent } from "../src/events.js";
import { exponentialBackoff } from "../src/backoff.js";
import { drainBody } from "../src/body.js";
import { PrometheusTelemetry } from "../src/prometheus.js";
import { newRequest } from "../src/request.js";
import { withTargetId } from "../src/meta.js";

const UPSTREAM = process.env.UPSTREAM ?? "http://127.0.0.1:3001";
const TOTAL = Number(process.env.TOTAL ?? 500);
const CONCURRENCY = Number(process.env.CONCURRENCY ?? 50);

const telemetry = new PrometheusTelemetry();
const breaker = new RollingWindowBreaker({
  windowSize: Number(process.env.BREAKER_WINDOW ?? 30),
  minRequests: Number(process.env.BREAKER_MIN_REQ ?? 10),
  failureThreshold: Number(process.env.BREAKER_THRESHOLD ?? 0.5),
  cooldownMs: Number(process.env.BREAKER_COOLDOWN_MS ?? 800),
  halfOpenProbeCount: Number(process.env.BREAKER_PROBES ?? 3),
});

const client = createRetryableClient(Number(process.env.RETRY_MAX ?? 2), {
  timeoutMs: Number(process.env.REQUEST_TIMEOUT_MS ?? 120),
  backoff: exponentialBackoff(10, 200),
  circuitBreaker: breaker,
  cache: new LocalCache({ maxSizeMiB: 8 }),
  enableClientTrace: true,
  telemetry,
});

type Counters = Record<"ok" | "cached" | "http5xx" | "timeout" | "circuitOpen" | "otherErr", number>;
const c: Counters = { ok: 0, cached: 0, http5xx: 0, timeout: 0, circuitOpen: 0, otherErr: 0 };

breaker.on("breaker:state", (e: BreakerStateEvent) => {
  // eslint-disable-next-line no-console
  console.log(`[breaker] key=${e.key} ${e.from} -> ${e.to}`);
});

let exhausted = 0;
client.on("retry:exhausted", (_e: RetryExhaustedEvent) => {
  exhausted++;
});

function classifyErr(err: unknown): keyof Counters {
  if (err instanceof CircuitOpenError) return "circuitOpen";
  if (isTimeoutError(err)) return "timeout";
  return "otherErr";
}

async function worker(jobs: number[]) {
  for (const i of jobs) {
    const path = i % 5 === 0 ? "/static" : "/flaky";
    try {
      const req = withTargetId(await newRequest("GET", `${UPSTREAM}${path}`), "upstream");
      const resp = await client.do(req);
      if (resp.headers["x-from-cache"] === "1") c.cached++;
      else if (resp.status >= 500) c.http5xx++;
      else c.ok++;
      await drainBody(resp.body, Infinity);
    } catch (err) {
      c[classifyErr(err)]++;
    }

    const done = c.ok + c.cached + c.http5xx + c.timeout + c.circuitOpen + c.otherErr;
    if (done % 50 === 0) {
      const snap = client.snapshot();
      // eslint-disable-next-line no-console
      console.log(
        `[snap] conns=${JSON.stringify(snap.connections)} ok=${c.ok} cached=${c.cached} 5xx=${c.http5xx} to=${c.timeout} co=${c.circuitOpen} exhausted=${exhausted}`
      );
    }
  }
}

function chunkIndices(total: number, workers: number): number[][] {
  const chunks: number[][] = Array.from({ length: workers }, () => []);
  for (let i = 0; i < total; i++) chunks[i % workers].push(i);
  return chunks;
}

async function main() {
  // eslint-disable-next-line no-console
  console.log(`[loadgen] upstream=${UPSTREAM} total=${TOTAL} concurrency=${CONCURRENCY}`);

  await Promise.all(chunkIndices(TOTAL, CONCURRENCY).map((jobs) => worker(jobs)));

  // eslint-disable-next-line no-console
  console.log(`[done]`, c);
  // eslint-disable-next-line no-console
  console.log(`[final snapshot]`, client.snapshot());
  // eslint-disable-next-line no-console
  console.log(await telemetry.registry.metrics());

  await client.close();
}

main().catch((e) => {
  // eslint-disable-next-line no-console
  console.error(e);
  process.exit(1);
});
