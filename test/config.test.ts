import { describe, expect, it } from "vitest";
import { LocalCache } from "../src/cache/localCache.js";
import { clientOptionsFromConfig } from "../src/client.js";
import { loadConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      timeoutMs: 3000,
      retryMax: 0,
      dialTimeoutMs: 300,
      cacheMaxMiB: 0,
      enableClientTrace: false,
      logLevel: "info",
    });
  });

  it("reads the environment", () => {
    const config = loadConfig({
      TRANSIT_HTTP_TIMEOUT_MS: "1500",
      TRANSIT_HTTP_RETRY_MAX: "2",
      TRANSIT_HTTP_DIAL_TIMEOUT_MS: "100",
      TRANSIT_HTTP_CACHE_MAX_MIB: "64",
      TRANSIT_HTTP_CLIENT_TRACE: "1",
      LOG_LEVEL: "debug",
    });
    expect(config).toEqual({
      timeoutMs: 1500,
      retryMax: 2,
      dialTimeoutMs: 100,
      cacheMaxMiB: 64,
      enableClientTrace: true,
      logLevel: "debug",
    });
  });

  it("lists every invalid variable", () => {
    let caught: unknown;
    try {
      loadConfig({ TRANSIT_HTTP_RETRY_MAX: "-1", LOG_LEVEL: "loud" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues.map((i) => i.split(":")[0])).toEqual(["TRANSIT_HTTP_RETRY_MAX", "LOG_LEVEL"]);
  });

  it("rejects flags that are not booleans", () => {
    expect(() => loadConfig({ TRANSIT_HTTP_CLIENT_TRACE: "yes" })).toThrow(ConfigError);
  });
});

describe("clientOptionsFromConfig", () => {
  const base = loadConfig({});

  it("maps timeouts and tracing", () => {
    const opts = clientOptionsFromConfig({ ...base, timeoutMs: 800, dialTimeoutMs: 50, enableClientTrace: true });
    expect(opts).toEqual({ timeoutMs: 800, enableClientTrace: true, pool: { dialTimeoutMs: 50 } });
  });

  it("adds a local cache when a size is configured", () => {
    const opts = clientOptionsFromConfig({ ...base, cacheMaxMiB: 8 });
    expect(opts.cache).toBeInstanceOf(LocalCache);
  });
});
