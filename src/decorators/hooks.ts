import { toError } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import type { OutboundRequest, OutboundResponse, TransportDecorator } from "../types.js";

/** Runs before the request is sent; may mutate headers. Throwing aborts the request. */
export type RequestHook = (req: OutboundRequest) => void | Promise<void>;

/** Runs after the round trip settled, whatever the outcome. */
export type ResponseHook = (
  req: OutboundRequest,
  res: OutboundResponse | undefined,
  err: Error | undefined
) => void | Promise<void>;

export interface HookDecoratorOptions {
  logger?: Logger;
}

/**
 * Request hooks run in order and short-circuit the round trip by throwing; the error
 * reaches the caller untouched. Response hooks observe every outcome and cannot
 * change it: a throwing response hook is logged and skipped.
 */
export function hookDecorator(
  requestHooks: readonly RequestHook[],
  responseHooks: readonly ResponseHook[] = [],
  opts: HookDecoratorOptions = {}
): TransportDecorator {
  const before = [...requestHooks];
  const after = [...responseHooks];
  const log = opts.logger ?? createLogger("hooks");

  return (next) => ({
    async roundTrip(req) {
      for (const hook of before) await hook(req);

      let res: OutboundResponse | undefined;
      let failure: { error: unknown } | undefined;
      try {
        res = await next.roundTrip(req);
      } catch (error) {
        failure = { error };
      }

      const err = failure ? toError(failure.error) : undefined;
      for (const hook of after) {
        try {
          await hook(req, res, err);
        } catch (hookErr) {
          log.warn({ err: hookErr, hook: hook.name || "anonymous", url: req.url }, "response hook failed");
        }
      }

      if (failure) throw failure.error;
      if (res === undefined) throw new Error("transport resolved without a response");
      return res;
    },
  });
}
