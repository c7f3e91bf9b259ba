import { z } from "zod";
import { bytesStream } from "../body.js";
import type { HttpHeaders, OutboundResponse } from "../types.js";

export const FROM_CACHE_HEADER = "x-from-cache";

const entrySchema = z.object({
  v: z.literal(1),
  status: z.number().int(),
  statusText: z.string().optional(),
  headers: z.record(z.string()),
  body: z.string(), // base64
});

export interface CachedEntry {
  status: number;
  statusText?: string;
  headers: HttpHeaders;
  body: Buffer;
}

export function encodeEntry(res: Pick<OutboundResponse, "status" | "statusText" | "headers">, body: Uint8Array): Uint8Array {
  const headers: HttpHeaders = { ...res.headers };
  delete headers[FROM_CACHE_HEADER];
  const envelope: z.infer<typeof entrySchema> = {
    v: 1,
    status: res.status,
    ...(res.statusText !== undefined ? { statusText: res.statusText } : {}),
    headers,
    body: Buffer.from(body).toString("base64"),
  };
  return Buffer.from(JSON.stringify(envelope), "utf8");
}

/** undefined for bytes that are not a stored entry; the caller treats that as a miss. */
export function decodeEntry(bytes: Uint8Array | undefined): CachedEntry | undefined {
  if (bytes === undefined) return undefined;

  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(bytes).toString("utf8"));
  } catch {
    return undefined;
  }

  const parsed = entrySchema.safeParse(raw);
  if (!parsed.success) return undefined;
  const { status, statusText, headers, body } = parsed.data;
  return {
    status,
    ...(statusText !== undefined ? { statusText } : {}),
    headers,
    body: Buffer.from(body, "base64"),
  };
}

export function entryResponse(entry: CachedEntry, markFromCache: boolean): OutboundResponse {
  const headers: HttpHeaders = { ...entry.headers };
  if (markFromCache) headers[FROM_CACHE_HEADER] = "1";
  return {
    status: entry.status,
    ...(entry.statusText !== undefined ? { statusText: entry.statusText } : {}),
    headers,
    body: bytesStream(entry.body),
  };
}
