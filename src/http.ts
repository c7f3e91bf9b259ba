// src/http.ts
import type { IncomingHttpHeaders } from "node:http";
import { request as undiciRequest, type Dispatcher } from "undici";
import { abortReason } from "./errors.js";
import type { HttpHeaders, OutboundRequest, OutboundResponse } from "./types.js";
import { clientTraceStorage } from "./utils/undiciChannels.js";

export function normalizeHeaders(headers: Record<string, string | string[] | undefined> | null | undefined): HttpHeaders {
  const out: HttpHeaders = {};
  if (!headers) return out;

  for (const [k, v] of Object.entries(headers)) {
    if (v === undefined) continue;
    out[k.toLowerCase()] = Array.isArray(v) ? v.join(", ") : v;
  }
  return out;
}

function outgoingHeaders(req: OutboundRequest): IncomingHttpHeaders {
  const out: IncomingHttpHeaders = {};
  for (const [k, v] of Object.entries(req.headers)) out[k] = v;
  if (req.body !== undefined && req.contentLength !== undefined && out["content-length"] === undefined) {
    out["content-length"] = String(req.contentLength);
  }
  return out;
}

/**
 * One HTTP exchange on `dispatcher`. No retries, no redirects, no timeout of its own:
 * the request signal bounds it. Resolves once headers arrive; the body streams.
 */
export async function doHttpRequest(dispatcher: Dispatcher, req: OutboundRequest): Promise<OutboundResponse> {
  const send = () =>
    undiciRequest(req.url, {
      dispatcher,
      method: req.method,
      headers: outgoingHeaders(req),
      body: req.body ?? null,
      signal: req.signal,
    });

  try {
    const trace = req.meta.clientTrace;
    const res = await (trace ? clientTraceStorage.run(trace, send) : send());

    return {
      status: res.statusCode,
      headers: normalizeHeaders(res.headers),
      body: res.body,
    };
  } catch (err) {
    // undici rejects with its own AbortError; surface the reason the caller aborted with
    if (req.signal?.aborted) throw abortReason(req.signal);
    throw err;
  }
}
