/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { StrongboxService } from "../services/strongbox-service.js";
import type { ErrorCode } from "./error.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The service behind the API (set in createApp) */
    service: StrongboxService;

    /** Caller named by X-Actor-Id (set by actor middleware) */
    actorId: string;

    /** Code of the error envelope (set by the error handler) */
    errorCode: ErrorCode;
  };
}
