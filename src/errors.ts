// src/errors.ts

/** Raised by the circuit breaker decorator when the bucket is not admitting requests. */
export class CircuitOpenError extends Error {
  override readonly name = "CircuitOpenError";

  constructor(
    public readonly key: string,
    public readonly retryAfterMs: number = 0
  ) {
    super(`transport: circuit breaker open (bucket=${key})`);
  }
}

export class RequestTimeoutError extends Error {
  override readonly name = "RequestTimeoutError";

  constructor(public readonly timeoutMs: number) {
    super(`request timed out after ${timeoutMs}ms`);
  }
}

export class ConnectTimeoutError extends Error {
  override readonly name = "ConnectTimeoutError";
  readonly code = "ETIMEDOUT";

  constructor(
    public readonly address: string,
    public readonly timeoutMs: number
  ) {
    super(`connect to ${address} timed out after ${timeoutMs}ms`);
  }
}

export class TlsHandshakeTimeoutError extends Error {
  override readonly name = "TlsHandshakeTimeoutError";
  readonly code = "ETIMEDOUT";

  constructor(
    public readonly address: string,
    public readonly timeoutMs: number
  ) {
    super(`TLS handshake with ${address} timed out after ${timeoutMs}ms`);
  }
}

/** The request body could not be replayed for a retry. No request was sent for that attempt. */
export class BodyRewindError extends Error {
  override readonly name = "BodyRewindError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class UnsupportedBodyError extends Error {
  override readonly name = "UnsupportedBodyError";

  constructor(public readonly bodyType: string) {
    super(`cannot handle body of type ${bodyType}`);
  }
}

export class ConfigError extends Error {
  override readonly name = "ConfigError";

  constructor(public readonly issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
  }
}

const TIMEOUT_CODES = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

/** Whether a transport error is a timeout rather than a generic failure. */
export function isTimeoutError(err: unknown): boolean {
  if (
    err instanceof RequestTimeoutError ||
    err instanceof ConnectTimeoutError ||
    err instanceof TlsHandshakeTimeoutError
  ) {
    return true;
  }
  if (typeof err !== "object" || err === null) return false;

  // AbortSignal.timeout() aborts with a DOMException named TimeoutError
  if ("name" in err && err.name === "TimeoutError") return true;
  if ("code" in err && typeof err.code === "string" && TIMEOUT_CODES.has(err.code)) return true;

  return "cause" in err && err.cause !== err && isTimeoutError(err.cause);
}

export function isCircuitOpenError(err: unknown): err is CircuitOpenError {
  return err instanceof CircuitOpenError;
}

export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === "string" ? value : `non-error thrown: ${String(value)}`);
}

/** The reason an aborted signal carries, as an Error. */
export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason;
  const err = new Error("This operation was aborted");
  err.name = "AbortError";
  return err;
}
