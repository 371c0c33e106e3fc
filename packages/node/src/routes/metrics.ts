/**
 * Metrics route.
 *
 * GET /metrics — Prometheus text exposition format.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { MetricsCollector } from "../middleware/metrics.js";
import type { StrongboxService } from "../services/strongbox-service.js";

export function createMetricsRoute(
  collector: MetricsCollector,
  service: StrongboxService,
): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/metrics", (c) => {
    // Gauges are read at scrape time.
    const gauges = [
      "# HELP strongbox_objects_stored Objects currently held by the store",
      "# TYPE strongbox_objects_stored gauge",
      `strongbox_objects_stored ${service.store.size}`,
      "# HELP strongbox_access_records Records in the access ledger",
      "# TYPE strongbox_access_records gauge",
      `strongbox_access_records ${service.ledger.size}`,
    ];
    const body = collector.render() + gauges.join("\n") + "\n";
    return c.text(body, 200, {
      "Content-Type": "text/plain; version=0.0.4; charset=utf-8",
    });
  });

  return routes;
}
