export { createHealthRoutes } from "./health.js";
export { createMetricsRoute } from "./metrics.js";
export { createKeyRoutes } from "./keys.js";
export { createObjectRoutes } from "./objects.js";
export type { ObjectRouteOptions } from "./objects.js";
export { createAccessRoutes } from "./access.js";
