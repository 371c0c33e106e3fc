/**
 * Zod validation middleware.
 *
 * Validates request body against a Zod schema.
 * Returns 400 with error envelope on validation failure.
 */

import type { MiddlewareHandler } from "hono";
import type { z, ZodError, ZodTypeAny } from "zod";
import { createErrorEnvelope } from "../types/error.js";

/** Env contributed by validateBody, merged into the route's env. */
export interface ValidatedBodyEnv<T> {
  Variables: {
    validatedBody: T;
  };
}

/**
 * Validate JSON request body against a Zod schema.
 *
 * On success, sets `validatedBody` in context variables, typed as the
 * schema's output.
 */
export function validateBody<S extends ZodTypeAny>(
  schema: S,
): MiddlewareHandler<ValidatedBodyEnv<z.output<S>>> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
        400,
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }

    c.set("validatedBody", result.data);
    await next();
  };
}

export function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
