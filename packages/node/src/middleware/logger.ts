/**
 * Request logging middleware.
 *
 * Hands one entry per request to a callback; main.ts wires it to pino.
 * Entries never include bodies, so no plaintext reaches the log.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ErrorCode } from "../types/error.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** Who acted, on routes behind the actor middleware */
  readonly actorId?: string;
  /** Code of the error envelope, when the error handler produced the response */
  readonly errorCode?: ErrorCode;
}

export type RequestLogLevel = "info" | "warn" | "error";

/** 5xx is an error, 4xx a warning */
export function logLevelFor(status: number): RequestLogLevel {
  if (status >= 500) return "error";
  if (status >= 400) return "warn";
  return "info";
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    // Both are unset when the request never reached the middleware
    // or handler that sets them.
    const actorId: string | undefined = c.get("actorId");
    const errorCode: ErrorCode | undefined = c.get("errorCode");

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      ...(actorId !== undefined ? { actorId } : {}),
      ...(errorCode !== undefined ? { errorCode } : {}),
    });
  };
}
