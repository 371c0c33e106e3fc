/**
 * Type barrel — re-exports all public types from @strongbox/node.
 */

// DTOs
export {
  PaginationQuerySchema,
  ContentEncodingSchema,
  PutObjectSchema,
  GetObjectQuerySchema,
  ListObjectsQuerySchema,
  ListAccessQuerySchema,
} from "./dto.js";
export type {
  ContentEncoding,
  PutObjectDto,
  GetObjectQuery,
  ListObjectsQuery,
  ListAccessQuery,
} from "./dto.js";

// Error
export { ERROR_STATUS, createErrorEnvelope, isErrorCode } from "./error.js";
export type {
  ApiErrorCode,
  DomainErrorCode,
  ErrorCode,
  ErrorDetail,
  ErrorEnvelope,
} from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  CursorValue,
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv } from "./api-contract.js";
