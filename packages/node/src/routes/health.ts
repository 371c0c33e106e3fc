/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (service up and access ledger chain intact)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { StrongboxService } from "../services/strongbox-service.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(service: StrongboxService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const serviceStatus: SubsystemStatus = service.isReady()
      ? { status: "ok" }
      : { status: "down", detail: "stopped" };

    const integrity = service.verifyLedger();
    const ledgerStatus: SubsystemStatus = integrity.valid
      ? { status: "ok" }
      : {
          status: "down",
          detail: `chainValid=false, errors=${integrity.errors.length}`,
        };

    const ready = serviceStatus.status === "ok" && ledgerStatus.status === "ok";

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        subsystems: { service: serviceStatus, accessLedger: ledgerStatus },
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
