import { withTargetId } from "../meta.js";
import type { TransportDecorator } from "../types.js";

/** Stamps the target id on requests that do not name one yet. */
export function targetDecorator(targetId: string): TransportDecorator {
  return (next) => ({
    roundTrip(req) {
      if (req.meta.targetId) return next.roundTrip(req);
      return next.roundTrip(withTargetId(req, targetId));
    },
  });
}
