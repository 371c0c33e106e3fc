/**
 * Access ledger routes.
 *
 * GET /api/v1/access            — Ledger records, filtered, by sequence
 * GET /api/v1/access/integrity  — Hash chain verification
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListAccessQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";
import { formatZodErrors } from "../middleware/validate.js";

export function createAccessRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/access
  routes.get("/", (c) => {
    const queryResult = ListAccessQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const { cursor, limit, actorId, objectId, action } = queryResult.data;
    const records = c.get("service").queryAccess({ actorId, objectId, action });

    return c.json(
      paginate(records, { cursor, limit }, (r) => r.sequence, "sequence"),
    );
  });

  // GET /api/v1/access/integrity
  routes.get("/integrity", (c) => {
    return c.json({ data: c.get("service").verifyLedger() });
  });

  return routes;
}
