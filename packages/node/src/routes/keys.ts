/**
 * Key routes.
 *
 * GET /api/v1/keys/public — The service's public key, for callers that
 * seal envelopes themselves.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createKeyRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/public", (c) => {
    return c.json({ data: c.get("service").publicKeyInfo() });
  });

  return routes;
}
