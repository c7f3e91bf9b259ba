// demo/upstream.ts
import http from "node:http";

const PORT = Number(process.env.UPSTREAM_PORT ?? 3001);

// Behavior knobs
const FAIL_RATE = Number(process.env.FAIL_RATE ?? 0.3);          // 500s
const UNAVAILABLE_RATE = Number(process.env.UNAVAILABLE_RATE ?? 0.1); // 503 + Retry-After
const SLOW_RATE = Number(process.env.SLOW_RATE ?? 0.2);
const SLOW_MS = Number(process.env.SLOW_MS ?? 300);
const MAX_AGE_S = Number(process.env.MAX_AGE_S ?? 5);

const server = http.createServer((req, res) => {
  if (!req.url) {
    res.statusCode = 400;
    return res.end("bad request");
  }

  if (req.url.startsWith("/health")) {
    res.statusCode = 200;
    return res.end("ok");
  }

  // cacheable resource
  if (req.url.startsWith("/static")) {
    res.statusCode = 200;
    res.setHeader("date", new Date().toUTCString());
    res.setHeader("cache-control", `max-age=${MAX_AGE_S}`);
    res.setHeader("content-type", "application/json");
    return res.end(JSON.stringify({ ok: true, kind: "static", ts: Date.now() }));
  }

  const retry = req.headers["x-retry"];
  const r = Math.random();

  if (r < FAIL_RATE) {
    res.statusCode = 500;
    res.setHeader("content-type", "application/json");
    return res.end(JSON.stringify({ ok: false, kind: "fail", retry, ts: Date.now() }));
  }

  if (r < FAIL_RATE + UNAVAILABLE_RATE) {
    res.statusCode = 503;
    res.setHeader("retry-after", "1");
    return res.end();
  }

  if (r < FAIL_RATE + UNAVAILABLE_RATE + SLOW_RATE) {
    setTimeout(() => {
      res.statusCode = 200;
      res.setHeader("content-type", "application/json");
      res.end(JSON.stringify({ ok: true, kind: "slow", retry, ts: Date.now() }));
    }, SLOW_MS);
    return;
  }

  res.statusCode = 200;
  res.setHeader("content-type", "application/json");
  res.end(JSON.stringify({ ok: true, kind: "fast", retry, ts: Date.now() }));
});

server.listen(PORT, "127.0.0.1", () => {
  // eslint-disable-next-line no-console
  console.log(
    `[upstream] listening on http://127.0.0.1:${PORT} (FAIL_RATE=${FAIL_RATE}, UNAVAILABLE_RATE=${UNAVAILABLE_RATE}, SLOW_RATE=${SLOW_RATE}, SLOW_MS=${SLOW_MS})`
  );
});
