/**
 * Object routes.
 *
 * PUT    /api/v1/objects/:objectId           — Encrypt and store
 * GET    /api/v1/objects/:objectId           — Decrypt and verify
 * GET    /api/v1/objects/:objectId/envelope  — The sealed envelope as stored
 * DELETE /api/v1/objects/:objectId           — Remove
 * GET    /api/v1/objects                     — List object ids (cursor pagination)
 *
 * Every route needs X-Actor-Id.
 */

import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import type { AppEnv } from "../types/api-contract.js";
import {
  GetObjectQuerySchema,
  ListObjectsQuerySchema,
  PutObjectSchema,
} from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";
import { actorMiddleware } from "../middleware/actor.js";
import { validateBody } from "../middleware/validate.js";
import type { MetricsCollector } from "../middleware/metrics.js";

export interface ObjectRouteOptions {
  /** Largest plaintext accepted by PUT */
  readonly maxObjectBytes: number;
  readonly metrics?: MetricsCollector | undefined;
}

// Room for base64 expansion plus the JSON around it.
function maxBodyBytes(maxObjectBytes: number): number {
  return Math.ceil(maxObjectBytes / 3) * 4 + 1024;
}

function tooLarge(maxObjectBytes: number) {
  return createErrorEnvelope(
    "PAYLOAD_TOO_LARGE",
    `Object exceeds ${maxObjectBytes} bytes`,
  );
}

const DOWNLOAD_FAILURE_LABEL = {
  stored: "not_found",
  retrieved: "decrypt_failed",
  decrypted: "integrity_failed",
} as const;

export function createObjectRoutes(options: ObjectRouteOptions): Hono<AppEnv> {
  const { maxObjectBytes, metrics } = options;
  const routes = new Hono<AppEnv>();

  routes.use("*", actorMiddleware());
  routes.use(
    "*",
    bodyLimit({
      maxSize: maxBodyBytes(maxObjectBytes),
      onError: (c) => c.json(tooLarge(maxObjectBytes), 413),
    }),
  );

  // GET /api/v1/objects
  routes.get("/", (c) => {
    const queryResult = ListObjectsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const query = queryResult.data;
    const result = paginate(
      c.get("service").listObjects(),
      { cursor: query.cursor, limit: query.limit },
      (id) => id,
      "objectId",
    );

    return c.json(result);
  });

  // PUT /api/v1/objects/:objectId
  routes.put("/:objectId", validateBody(PutObjectSchema), (c) => {
    const service = c.get("service");
    const objectId = c.req.param("objectId");
    const body = c.get("validatedBody");

    const content = Buffer.from(body.content, body.encoding);
    try {
      if (content.length > maxObjectBytes) {
        return c.json(tooLarge(maxObjectBytes), 413);
      }

      const result = service.putObject(c.get("actorId"), objectId, content);
      metrics?.incrementCounter("strongbox_objects_total", { action: "upload" });

      return c.json(
        {
          data: {
            objectId: result.objectId,
            size: content.length,
            createdAt: result.stored.createdAt,
            sequence: result.record?.sequence ?? null,
          },
        },
        201,
      );
    } finally {
      content.fill(0);
    }
  });

  // GET /api/v1/objects/:objectId
  routes.get("/:objectId", (c) => {
    const queryResult = GetObjectQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const outcome = c.get("service").getObject(c.get("actorId"), c.req.param("objectId"));

    if (!outcome.ok) {
      const label =
        outcome.failedAt === "stored" ||
        outcome.failedAt === "retrieved" ||
        outcome.failedAt === "decrypted"
          ? DOWNLOAD_FAILURE_LABEL[outcome.failedAt]
          : "error";
      metrics?.incrementCounter("strongbox_objects_total", {
        action: "download",
        outcome: label,
      });
      throw outcome.error;
    }

    metrics?.incrementCounter("strongbox_objects_total", {
      action: "download",
      outcome: "ok",
    });

    const { plaintext } = outcome;
    try {
      return c.json({
        data: {
          objectId: outcome.objectId,
          content: plaintext.toString(queryResult.data.encoding),
          encoding: queryResult.data.encoding,
          size: plaintext.length,
          verified: true,
        },
      });
    } finally {
      plaintext.fill(0);
    }
  });

  // GET /api/v1/objects/:objectId/envelope
  routes.get("/:objectId/envelope", (c) => {
    return c.json({ data: c.get("service").getEnvelope(c.req.param("objectId")) });
  });

  // DELETE /api/v1/objects/:objectId
  routes.delete("/:objectId", (c) => {
    c.get("service").deleteObject(c.get("actorId"), c.req.param("objectId"));
    metrics?.incrementCounter("strongbox_objects_total", { action: "delete" });
    return c.body(null, 204);
  });

  return routes;
}
