import { z } from "zod";
import { ConfigError } from "./errors.js";

export const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const envSchema = z.object({
  TRANSIT_HTTP_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(3000),
  TRANSIT_HTTP_RETRY_MAX: z.coerce.number().int().nonnegative().default(0),
  TRANSIT_HTTP_DIAL_TIMEOUT_MS: z.coerce.number().int().positive().default(300),
  // 0 disables response caching
  TRANSIT_HTTP_CACHE_MAX_MIB: z.coerce.number().int().nonnegative().default(0),
  TRANSIT_HTTP_CLIENT_TRACE: booleanFlag.default("false"),
  LOG_LEVEL: logLevelSchema.default("info"),
});

export type LogLevel = z.infer<typeof logLevelSchema>;

export interface TransitConfig {
  timeoutMs: number;
  retryMax: number;
  dialTimeoutMs: number;
  cacheMaxMiB: number;
  enableClientTrace: boolean;
  logLevel: LogLevel;
}

/**
 * Load client configuration from environment variables.
 * Throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TransitConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }

  const e = parsed.data;
  return {
    timeoutMs: e.TRANSIT_HTTP_TIMEOUT_MS,
    retryMax: e.TRANSIT_HTTP_RETRY_MAX,
    dialTimeoutMs: e.TRANSIT_HTTP_DIAL_TIMEOUT_MS,
    cacheMaxMiB: e.TRANSIT_HTTP_CACHE_MAX_MIB,
    enableClientTrace: e.TRANSIT_HTTP_CLIENT_TRACE,
    logLevel: e.LOG_LEVEL,
  };
}
