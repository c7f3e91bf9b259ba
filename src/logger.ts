/**
 * Structured logging using pino.
 * The root level comes from LOG_LEVEL and falls back to "info" when unset or invalid.
 */
import { pino } from "pino";
import type { Logger } from "pino";
import { logLevelSchema } from "./config.js";

export type { Logger } from "pino";

const rootLogger: Logger = pino({
  name: "transit-http",
  level: logLevelSchema.catch("info").parse(process.env.LOG_LEVEL),
  base: { pid: process.pid },
});

export function createLogger(component: string): Logger {
  return rootLogger.child({ component });
}
