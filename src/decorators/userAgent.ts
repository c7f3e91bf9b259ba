import type { TransportDecorator } from "../types.js";
import { USER_AGENT } from "../version.js";

/** Sets `user-agent` unless the request already carries one. */
export function userAgentDecorator(userAgent: string = USER_AGENT): TransportDecorator {
  return (next) => ({
    roundTrip(req) {
      if (req.headers["user-agent"] !== undefined) return next.roundTrip(req);
      return next.roundTrip({ ...req, headers: { ...req.headers, "user-agent": userAgent } });
    },
  });
}
