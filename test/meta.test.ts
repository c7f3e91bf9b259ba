import { describe, expect, it } from "vitest";
import { isTimeoutError, RequestTimeoutError } from "../src/errors.js";
import { RequestMeta, retryCount, withDeadline, withForwardedHeaders, withMeta, withTargetId } from "../src/meta.js";
import { outcomeTags, phaseStatus, sanitizeMetricTagValue } from "../src/telemetry.js";
import { fakeResponse, requestOf } from "./helpers.js";

describe("RequestMeta", () => {
  it("derives new bags without touching the original", () => {
    const base = RequestMeta.of({ targetId: "users" });
    const next = base.with({ retryAttempt: 2 });

    expect(base.retryAttempt).toBe(0);
    expect(next.retryAttempt).toBe(2);
    expect(next.targetId).toBe("users");
  });

  it("attaches meta to a copy of the request", () => {
    const req = requestOf("http://users.test/");
    const tagged = withTargetId(req, "users");

    expect(tagged.meta.targetId).toBe("users");
    expect(req.meta.targetId).toBeUndefined();
    expect(retryCount(withMeta(req, { retryAttempt: 3 }))).toBe(3);
  });

  it("lower-cases forwarded header names", () => {
    const req = withForwardedHeaders(requestOf("http://users.test/"), { "X-B3-TraceId": "abc" });
    expect(req.meta.forwardedHeaders).toEqual({ "x-b3-traceid": "abc" });
  });

  it("keeps the earlier of two deadlines", () => {
    const req = withDeadline(requestOf("http://users.test/"), 1000, 10_000);
    expect(req.deadline).toBe(11_000);
    expect(req.signal?.aborted).toBe(false);

    expect(withDeadline(req, 5000, 10_000).deadline).toBe(11_000);
    expect(withDeadline(req, 200, 10_000).deadline).toBe(10_200);
  });
});

describe("metric tags", () => {
  it.each([
    ["", ""],
    ["/", "/"],
    ["/users/{id}/", "/users/_id"],
    ["Users/{id}//", "Users/_id"],
    ["orders", "orders"],
  ])("sanitizes %j to %j", (input, expected) => {
    expect(sanitizeMetricTagValue(input)).toBe(expected);
  });

  it("describes outcomes", () => {
    expect(outcomeTags(fakeResponse(404), undefined)).toEqual({ status: "404", status_class: "4xx" });
    expect(outcomeTags(undefined, new RequestTimeoutError(10))).toEqual({ status: "timeout", status_class: "error" });
    expect(outcomeTags(undefined, new Error("reset"))).toEqual({ status: "error", status_class: "error" });
  });

  it("classifies phase errors", () => {
    expect(phaseStatus(undefined)).toBe("ok");
    expect(phaseStatus(new Error("refused"))).toBe("error");
    expect(phaseStatus(new Error("wrapped", { cause: { code: "UND_ERR_HEADERS_TIMEOUT" } }))).toBe("timeout");
  });

  it("recognizes abort-signal timeouts", () => {
    const err = new Error("The operation was aborted due to timeout");
    err.name = "TimeoutError";
    expect(isTimeoutError(err)).toBe(true);
  });
});
