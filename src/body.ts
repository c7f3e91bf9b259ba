// src/body.ts
import { Readable } from "node:stream";
import { toError } from "./errors.js";
import type { OutboundResponse } from "./types.js";

/** How much of a discarded response body is read so the connection can be reused. */
export const DRAIN_LIMIT_BYTES = 4096;

export interface DrainResult {
  bytes: number;
  error?: Error;
}

function byteLength(chunk: unknown): number {
  if (typeof chunk === "string") return Buffer.byteLength(chunk);
  if (chunk instanceof Uint8Array) return chunk.byteLength;
  return 0;
}

function toBuffer(chunk: unknown): Buffer {
  if (typeof chunk === "string") return Buffer.from(chunk);
  if (chunk instanceof Uint8Array) return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  throw new TypeError(`unexpected body chunk of type ${typeof chunk}`);
}

/**
 * Reads and discards up to `limit` bytes, then destroys the stream.
 * Read errors are reported, not thrown: the body is being thrown away anyway.
 */
export async function drainBody(body: Readable, limit: number = DRAIN_LIMIT_BYTES): Promise<DrainResult> {
  let bytes = 0;
  try {
    for await (const chunk of body) {
      bytes += byteLength(chunk);
      if (bytes >= limit) break;
    }
    return { bytes };
  } catch (err) {
    return { bytes, error: toError(err) };
  } finally {
    body.destroy();
  }
}

export async function readBody(source: OutboundResponse | Readable): Promise<Buffer> {
  const body = source instanceof Readable ? source : source.body;
  const chunks: Buffer[] = [];
  for await (const chunk of body) chunks.push(toBuffer(chunk));
  return Buffer.concat(chunks);
}

export async function readText(source: OutboundResponse | Readable): Promise<string> {
  return (await readBody(source)).toString("utf8");
}

export async function readJson<T = unknown>(source: OutboundResponse | Readable): Promise<T> {
  return JSON.parse(await readText(source));
}

/** A single-chunk stream over `bytes`. */
export function bytesStream(bytes: Uint8Array): Readable {
  return Readable.from(bytes.byteLength === 0 ? [] : [bytes]);
}

/** Reads the whole response body and replaces it with a fresh stream over the same bytes. */
export async function bufferResponseBody(res: OutboundResponse): Promise<Buffer> {
  const bytes = await readBody(res.body);
  res.body = bytesStream(bytes);
  return bytes;
}
