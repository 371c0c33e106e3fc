/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Domain errors carry a `code`; ERROR_STATUS picks the HTTP status.
 * Foreign errors and internal codes are a 500 with a generic message.
 */

import type { Context } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ERROR_STATUS, createErrorEnvelope, isErrorCode } from "../types/error.js";
import type { ErrorCode } from "../types/error.js";

export interface ErrorLogEntry {
  readonly requestId: string;
  readonly method: string;
  readonly path: string;
  readonly code: ErrorCode;
  readonly error: Error;
}

function getErrorCode(err: Error): ErrorCode {
  const code = "code" in err ? err.code : undefined;
  return typeof code === "string" && isErrorCode(code) ? code : "INTERNAL_ERROR";
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Create the handler registered with Hono's onError.
 *
 * `log` receives every error that maps to a 500.
 */
export function createErrorHandler(
  log?: (entry: ErrorLogEntry) => void,
): (err: Error, c: Context<AppEnv>) => Response {
  return (err, c) => {
    const code = getErrorCode(err);
    const status = ERROR_STATUS[code];

    if (status !== 500) {
      c.set("errorCode", code);
      return c.json(createErrorEnvelope(code, err.message), status);
    }

    log?.({
      requestId: c.get("requestId"),
      method: c.req.method,
      path: c.req.path,
      code,
      error: err,
    });
    c.set("errorCode", "INTERNAL_ERROR");
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  };
}
