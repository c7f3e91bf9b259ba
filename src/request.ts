import { Readable } from "node:stream";
import { readBody } from "./body.js";
import { UnsupportedBodyError } from "./errors.js";
import { RequestMeta, type RequestMetaFields } from "./meta.js";
import type { GetBodyFunc, HttpHeaders, HttpMethod, OutboundRequest, RequestBody } from "./types.js";

/** Produces a fresh body on every call. */
export type BodyFactory = () => RequestBody | Promise<RequestBody>;

export type RawBody =
  | string
  | Uint8Array
  | ArrayBuffer
  | Readable
  | AsyncIterable<Uint8Array | string>
  | BodyFactory;

export interface RequestInit {
  headers?: Record<string, string>;
  signal?: AbortSignal;
  deadline?: number;
  meta?: RequestMeta | RequestMetaFields;
}

export interface MaterializedBody {
  body?: RequestBody;
  getBody?: GetBodyFunc;
  contentLength?: number;
}

const EMPTY = new Uint8Array(0);

/**
 * Builds a request whose body can be replayed for retries.
 * Streams and async iterables are read into memory once; factories are called
 * once up front to learn the length and again for every replay.
 */
export async function newRequest(
  method: HttpMethod,
  url: string,
  rawBody?: RawBody,
  init: RequestInit = {}
): Promise<OutboundRequest> {
  assertUrl(url);

  const headers: HttpHeaders = {};
  for (const [k, v] of Object.entries(init.headers ?? {})) headers[k.toLowerCase()] = v;

  const meta = init.meta instanceof RequestMeta ? init.meta : RequestMeta.of(init.meta ?? {});
  const { body, getBody, contentLength } = await materializeBody(rawBody);

  return {
    method,
    url,
    headers,
    ...(body !== undefined ? { body } : {}),
    ...(getBody !== undefined ? { getBody } : {}),
    ...(contentLength !== undefined ? { contentLength } : {}),
    ...(init.signal ? { signal: init.signal } : {}),
    ...(init.deadline !== undefined ? { deadline: init.deadline } : {}),
    meta,
  };
}

/** Throws a TypeError for anything that is not an absolute URL. */
function assertUrl(url: string): void {
  if (!URL.canParse(url)) throw new TypeError(`invalid URL: ${url}`);
}

/** Turns any supported body shape into a replayable body plus its length when known. */
export async function materializeBody(raw: unknown): Promise<MaterializedBody> {
  if (raw === undefined || raw === null) return {};

  if (typeof raw === "string") return fromBytes(Buffer.from(raw, "utf8"));
  if (raw instanceof Uint8Array) return fromBytes(raw);
  if (raw instanceof ArrayBuffer) return fromBytes(new Uint8Array(raw));

  if (isBodyFactory(raw)) return fromFactory(raw);

  if (raw instanceof Readable || isAsyncIterable(raw)) {
    const bytes = await readBody(raw instanceof Readable ? raw : Readable.from(raw));
    if (bytes.byteLength === 0) return { getBody: async () => EMPTY, contentLength: 0 };
    return fromBytes(bytes);
  }

  throw new UnsupportedBodyError(describe(raw));
}

function fromBytes(bytes: Uint8Array): MaterializedBody {
  if (bytes.byteLength === 0) return { getBody: async () => EMPTY, contentLength: 0 };
  return { body: bytes, getBody: async () => bytes, contentLength: bytes.byteLength };
}

async function fromFactory(factory: (...args: never[]) => unknown): Promise<MaterializedBody> {
  const getBody = async (): Promise<RequestBody> => checkBody(await factory());

  const probe = await getBody();
  if (probe instanceof Readable) {
    // length unknown; the probe stream is not the one that gets sent
    probe.destroy();
    return { body: await getBody(), getBody };
  }
  const contentLength = typeof probe === "string" ? Buffer.byteLength(probe) : probe.byteLength;
  return { body: probe, getBody, contentLength };
}

function checkBody(value: unknown): RequestBody {
  if (typeof value === "string" || value instanceof Uint8Array || value instanceof Readable) return value;
  throw new UnsupportedBodyError(describe(value));
}

function isBodyFactory(value: unknown): value is (...args: never[]) => unknown {
  return typeof value === "function";
}

function isAsyncIterable(value: unknown): value is AsyncIterable<unknown> {
  return typeof value === "object" && value !== null && Symbol.asyncIterator in value;
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "object") return value.constructor?.name ?? "object";
  return typeof value;
}
