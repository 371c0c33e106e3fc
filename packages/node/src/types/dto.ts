/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Object DTOs
// =============================================================================

export const ContentEncodingSchema = z.enum(["utf8", "base64"]);

export type ContentEncoding = z.infer<typeof ContentEncodingSchema>;

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export const PutObjectSchema = z
  .object({
    content: z.string(),
    encoding: ContentEncodingSchema.default("utf8"),
  })
  .refine((dto) => dto.encoding !== "base64" || BASE64.test(dto.content), {
    message: "content is not valid base64",
    path: ["content"],
  });

export type PutObjectDto = z.infer<typeof PutObjectSchema>;

export const GetObjectQuerySchema = z.object({
  encoding: ContentEncodingSchema.default("base64"),
});

export type GetObjectQuery = z.infer<typeof GetObjectQuerySchema>;

export const ListObjectsQuerySchema = PaginationQuerySchema;

export type ListObjectsQuery = z.infer<typeof ListObjectsQuerySchema>;

// =============================================================================
// Access DTOs
// =============================================================================

export const ListAccessQuerySchema = PaginationQuerySchema.extend({
  actorId: z.string().min(1).optional(),
  objectId: z.string().min(1).optional(),
  action: z.enum(["upload", "download", "delete"]).optional(),
});

export type ListAccessQuery = z.infer<typeof ListAccessQuerySchema>;
