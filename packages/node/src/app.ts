/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { LedgerFailure } from "@strongbox/access-ledger";
import type { AppEnv } from "./types/api-contract.js";
import { DEFAULT_MAX_OBJECT_BYTES } from "./config.js";
import { StrongboxService } from "./services/strongbox-service.js";
import type { StrongboxServiceConfig } from "./services/strongbox-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import type { ErrorLogEntry } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { metricsMiddleware, MetricsCollector } from "./middleware/metrics.js";
import { createHealthRoutes } from "./routes/health.js";
import { createMetricsRoute } from "./routes/metrics.js";
import { createKeyRoutes } from "./routes/keys.js";
import { createObjectRoutes } from "./routes/objects.js";
import { createAccessRoutes } from "./routes/access.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** `onLedgerFailure` is wired by the app; set `ledgerFailureLogFn` instead */
  readonly serviceConfig: Omit<StrongboxServiceConfig, "onLedgerFailure">;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Receives every error answered with a 500 */
  readonly errorLogFn?: (entry: ErrorLogEntry) => void;
  /** Receives every ledger append given up on */
  readonly ledgerFailureLogFn?: (failure: LedgerFailure) => void;
  /** Largest object PUT accepts. Default: 10 MiB */
  readonly maxObjectBytes?: number;
  /** Enable metrics collection. Default: true */
  readonly enableMetrics?: boolean;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: StrongboxService;
  readonly metricsCollector: MetricsCollector;
}

export const LEDGER_DROPPED_METRIC = "strongbox_ledger_dropped_total";

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const metricsCollector = new MetricsCollector();
  metricsCollector.describe(
    LEDGER_DROPPED_METRIC,
    "Access ledger appends dropped after all attempts",
  );
  metricsCollector.describe("strongbox_objects_total", "Object operations by action and outcome");

  const enableMetrics = options.enableMetrics !== false;

  const service = new StrongboxService({
    ...options.serviceConfig,
    onLedgerFailure: (failure) => {
      metricsCollector.incrementCounter(LEDGER_DROPPED_METRIC, { action: failure.action });
      options.ledgerFailureLogFn?.(failure);
    },
  });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  if (enableMetrics) {
    app.use("*", metricsMiddleware(metricsCollector));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.errorLogFn));

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── Metrics Route ──────────────────────────────────────────────
  if (enableMetrics) {
    app.route("/", createMetricsRoute(metricsCollector, service));
  }

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/keys", createKeyRoutes());
  app.route(
    "/api/v1/objects",
    createObjectRoutes({
      maxObjectBytes: options.maxObjectBytes ?? DEFAULT_MAX_OBJECT_BYTES,
      metrics: enableMetrics ? metricsCollector : undefined,
    }),
  );
  app.route("/api/v1/access", createAccessRoutes());

  return { app, service, metricsCollector };
}
