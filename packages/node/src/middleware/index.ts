export { createErrorHandler } from "./error-handler.js";
export type { ErrorLogEntry } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware, logLevelFor } from "./logger.js";
export type { RequestLogEntry, RequestLogLevel } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";
export type { ValidatedBodyEnv } from "./validate.js";
export { actorMiddleware, ACTOR_ID_HEADER } from "./actor.js";
export {
  metricsMiddleware,
  MetricsCollector,
  formatLabels,
  normalizePath,
} from "./metrics.js";
