/**
 * Request ID middleware.
 *
 * Propagates the caller's X-Request-Id when it is a plausible token,
 * otherwise assigns a fresh UUID. The id is echoed on the response.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

// Printable ASCII without spaces; the id ends up in log lines.
const REQUEST_ID_PATTERN = /^[\x21-\x7e]{1,128}$/;

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId =
      incoming !== undefined && REQUEST_ID_PATTERN.test(incoming)
        ? incoming
        : randomUUID();

    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}
