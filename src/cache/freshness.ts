// src/cache/freshness.ts
import type { HttpHeaders } from "../types.js";

/** Directive name -> value; "" for directives without one. */
export type CacheControl = Map<string, string>;

export type Freshness = "fresh" | "stale" | "transparent";

const HOP_BY_HOP = new Set([
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "te",
  "trailers",
  "transfer-encoding",
  "upgrade",
]);

export function parseCacheControl(headers: HttpHeaders): CacheControl {
  const cc: CacheControl = new Map();
  const raw = headers["cache-control"];
  if (!raw) return cc;

  for (const part of raw.split(",")) {
    const directive = part.trim();
    if (directive === "") continue;
    const eq = directive.indexOf("=");
    if (eq < 0) {
      cc.set(directive.toLowerCase(), "");
    } else {
      const value = directive.slice(eq + 1).trim().replace(/^"(.*)"$/, "$1");
      cc.set(directive.slice(0, eq).trim().toLowerCase(), value);
    }
  }
  return cc;
}

export function parseHttpDate(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const t = Date.parse(value);
  return Number.isNaN(t) ? undefined : t;
}

/** Delta-seconds ("60", "1.5") in milliseconds. */
function parseSeconds(value: string): number | undefined {
  return /^\d+(\.\d+)?$/.test(value) ? Number(value) * 1000 : undefined;
}

/**
 * Classifies a stored response for a new request:
 * request no-cache -> transparent, response no-cache -> stale, only-if-cached -> fresh,
 * otherwise fresh while the lifetime (max-age, else Expires - Date, overridable by the
 * request's max-age) exceeds the age adjusted by min-fresh and max-stale.
 */
export function getFreshness(resHeaders: HttpHeaders, reqHeaders: HttpHeaders, nowMs: number): Freshness {
  const resCC = parseCacheControl(resHeaders);
  const reqCC = parseCacheControl(reqHeaders);

  if (reqCC.has("no-cache")) return "transparent";
  if (resCC.has("no-cache")) return "stale";
  if (reqCC.has("only-if-cached")) return "fresh";

  const date = parseHttpDate(resHeaders["date"]);
  if (date === undefined) return "stale";
  let age = nowMs - date;

  let lifetime = 0;
  const maxAge = resCC.get("max-age");
  if (maxAge !== undefined) {
    lifetime = parseSeconds(maxAge) ?? 0;
  } else {
    const expires = parseHttpDate(resHeaders["expires"]);
    if (expires !== undefined) lifetime = expires - date;
  }

  const reqMaxAge = reqCC.get("max-age");
  if (reqMaxAge !== undefined) lifetime = parseSeconds(reqMaxAge) ?? 0;

  const minFresh = reqCC.get("min-fresh");
  if (minFresh !== undefined) age += parseSeconds(minFresh) ?? 0;

  const maxStale = reqCC.get("max-stale");
  if (maxStale !== undefined) {
    // a client willing to accept any staleness
    if (maxStale === "") return "fresh";
    age -= parseSeconds(maxStale) ?? 0;
  }

  return lifetime > age ? "fresh" : "stale";
}

/** Whether a stored response may be served when revalidation failed (stale-if-error). */
export function canStaleOnError(resHeaders: HttpHeaders, reqHeaders: HttpHeaders, nowMs: number): boolean {
  let lifetime = -1;

  for (const cc of [parseCacheControl(resHeaders), parseCacheControl(reqHeaders)]) {
    const value = cc.get("stale-if-error");
    if (value === undefined) continue;
    if (value === "") return true;
    const parsed = parseSeconds(value);
    if (parsed === undefined) return false;
    lifetime = parsed;
  }

  if (lifetime < 0) return false;
  const date = parseHttpDate(resHeaders["date"]);
  if (date === undefined) return false;
  return lifetime > nowMs - date;
}

export function canStore(reqHeaders: HttpHeaders, resHeaders: HttpHeaders): boolean {
  return !parseCacheControl(resHeaders).has("no-store") && !parseCacheControl(reqHeaders).has("no-store");
}

/** Header names a 304 may refresh on the stored response: all but hop-by-hop ones. */
export function endToEndHeaders(headers: HttpHeaders): string[] {
  const hopByHop = new Set(HOP_BY_HOP);
  for (const token of (headers["connection"] ?? "").split(",")) {
    const name = token.trim().toLowerCase();
    if (name) hopByHop.add(name);
  }
  return Object.keys(headers).filter((name) => !hopByHop.has(name));
}

function varyNames(resHeaders: HttpHeaders): string[] {
  return (resHeaders["vary"] ?? "")
    .split(",")
    .map((v) => v.trim().toLowerCase())
    .filter((v) => v !== "");
}

/** The request carries the same values for every Vary header as the stored one did. */
export function varyMatches(storedHeaders: HttpHeaders, reqHeaders: HttpHeaders): boolean {
  for (const name of varyNames(storedHeaders)) {
    if ((reqHeaders[name] ?? "") !== (storedHeaders[`x-varied-${name}`] ?? "")) return false;
  }
  return true;
}

/** Copies the Vary-named request headers onto the response as x-varied-<name>. */
export function recordVaried(resHeaders: HttpHeaders, reqHeaders: HttpHeaders): void {
  for (const name of varyNames(resHeaders)) {
    const value = reqHeaders[name];
    if (value) resHeaders[`x-varied-${name}`] = value;
  }
}
