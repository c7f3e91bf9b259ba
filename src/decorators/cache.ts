// src/decorators/cache.ts
import { pipeline, Transform, type Readable, type TransformCallback } from "node:stream";
import { bytesStream } from "../body.js";
import { decodeEntry, encodeEntry, entryResponse, type CachedEntry } from "../cache/entry.js";
import {
  canStaleOnError,
  canStore,
  endToEndHeaders,
  getFreshness,
  parseCacheControl,
  recordVaried,
  varyMatches,
} from "../cache/freshness.js";
import { toError } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import type { CacheStore, HttpHeaders, OutboundRequest, OutboundResponse, TransportDecorator } from "../types.js";

export interface CacheDecoratorOptions {
  /** Adds `x-from-cache: 1` to responses served from the store. Default true. */
  markCachedResponses?: boolean;
  now?: () => number;
  logger?: Logger;
}

/** `url` for GET, `"<METHOD> <url>"` otherwise. */
export function cacheKey(req: Pick<OutboundRequest, "method" | "url">): string {
  return req.method === "GET" ? req.url : `${req.method} ${req.url}`;
}

function isCacheable(req: OutboundRequest): boolean {
  return (req.method === "GET" || req.method === "HEAD") && req.headers["range"] === undefined;
}

/**
 * Private HTTP cache following RFC 7234 freshness rules: fresh entries are served
 * without I/O, stale ones are revalidated with their validators, and requests with
 * other methods invalidate the entry for their key.
 */
export function cacheDecorator(store: CacheStore, opts: CacheDecoratorOptions = {}): TransportDecorator {
  const mark = opts.markCachedResponses ?? true;
  const now = opts.now ?? Date.now;
  const log = opts.logger ?? createLogger("cache");

  return (next) => ({
    async roundTrip(req) {
      const key = cacheKey(req);
      const cacheable = isCacheable(req);

      let cached: CachedEntry | undefined;
      if (cacheable) cached = decodeEntry(await store.get(key));
      else await store.delete(key);

      let res: OutboundResponse;
      if (cached) {
        let outgoing = req;
        if (varyMatches(cached.headers, req.headers)) {
          const freshness = getFreshness(cached.headers, req.headers, now());
          if (freshness === "fresh") return entryResponse(cached, mark);
          if (freshness === "stale") outgoing = withValidators(req, cached.headers);
        }

        let sent: OutboundResponse | undefined;
        let failure: { error: unknown } | undefined;
        try {
          sent = await next.roundTrip(outgoing);
        } catch (error) {
          failure = { error };
        }

        if (sent && req.method === "GET" && sent.status === 304) {
          for (const name of endToEndHeaders(sent.headers)) cached.headers[name] = sent.headers[name];
          sent.body.destroy();
          res = entryResponse(cached, mark);
        } else if (
          (failure || (sent && sent.status >= 500)) &&
          req.method === "GET" &&
          canStaleOnError(cached.headers, req.headers, now())
        ) {
          sent?.body.destroy();
          return entryResponse(cached, mark);
        } else {
          if (failure || !sent || sent.status !== 200) await store.delete(key);
          if (failure) throw failure.error;
          if (!sent) throw new Error("transport resolved without a response");
          res = sent;
        }
      } else if (parseCacheControl(req.headers).has("only-if-cached")) {
        res = gatewayTimeout();
      } else {
        res = await next.roundTrip(req);
      }

      if (cacheable && canStore(req.headers, res.headers)) {
        recordVaried(res.headers, req.headers);
        if (req.method === "GET") {
          const stored = res;
          res.body = storeOnEnd(res.body, log, (bytes) => store.set(key, encodeEntry(stored, bytes)));
        } else {
          await store.set(key, encodeEntry(res, new Uint8Array(0)));
        }
      } else {
        await store.delete(key);
      }
      return res;
    },
  });
}

function withValidators(req: OutboundRequest, stored: HttpHeaders): OutboundRequest {
  const headers: HttpHeaders = { ...req.headers };
  const etag = stored["etag"];
  if (etag && headers["if-none-match"] === undefined) headers["if-none-match"] = etag;
  const lastModified = stored["last-modified"];
  if (lastModified && headers["if-modified-since"] === undefined) headers["if-modified-since"] = lastModified;
  return { ...req, headers };
}

function gatewayTimeout(): OutboundResponse {
  return { status: 504, statusText: "Gateway Timeout", headers: {}, body: bytesStream(new Uint8Array(0)) };
}

/**
 * Passes the body through unchanged and hands the complete bytes to `onEnd` before the
 * reader sees the end of the stream. Bodies that fail or are abandoned are not stored.
 */
function storeOnEnd(source: Readable, log: Logger, onEnd: (bytes: Buffer) => Promise<void>): Readable {
  const chunks: Buffer[] = [];
  const tee = new Transform({
    transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
      chunks.push(chunk);
      callback(null, chunk);
    },
    flush(callback: TransformCallback) {
      onEnd(Buffer.concat(chunks)).then(
        () => callback(),
        (err: unknown) => {
          log.warn({ err: toError(err) }, "storing response in cache failed");
          callback();
        }
      );
    },
  });

  pipeline(source, tee, (err) => {
    if (err) log.debug({ err }, "response body not cached");
  });
  return tee;
}
