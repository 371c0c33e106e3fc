/**
 * Actor middleware.
 *
 * Reads the caller's identity from X-Actor-Id. The header is trusted as
 * given: it names who is acting for the access ledger, it does not
 * authenticate anyone.
 */

import type { MiddlewareHandler } from "hono";
import { MAX_ACTOR_ID_LENGTH } from "@strongbox/access-ledger";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const ACTOR_ID_HEADER = "X-Actor-Id";

export function actorMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const actorId = c.req.header(ACTOR_ID_HEADER)?.trim() ?? "";

    if (actorId.length === 0) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", `${ACTOR_ID_HEADER} header is required`),
        400,
      );
    }
    if (actorId.length > MAX_ACTOR_ID_LENGTH) {
      return c.json(
        createErrorEnvelope(
          "VALIDATION_ERROR",
          `${ACTOR_ID_HEADER} must be at most ${MAX_ACTOR_ID_LENGTH} characters`,
        ),
        400,
      );
    }

    c.set("actorId", actorId);
    await next();
  };
}
