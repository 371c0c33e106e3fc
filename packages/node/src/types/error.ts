/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: ErrorCode, message: string, details?: Record<string, unknown> } }
 *
 * Every code the domain packages can raise has a status here, so a new
 * code in any of them fails the type-check until it is mapped.
 */

import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { AccessLedgerErrorCode } from "@strongbox/access-ledger";
import type { CryptoErrorCode } from "@strongbox/crypto";
import type { ObjectStoreErrorCode } from "@strongbox/object-store";
import type { VaultErrorCode } from "@strongbox/vault";

// =============================================================================
// Error Codes
// =============================================================================

/** Codes produced by the HTTP layer itself */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "PAYLOAD_TOO_LARGE"
  | "INTERNAL_ERROR";

/** Codes carried by errors thrown from the domain packages */
export type DomainErrorCode =
  | CryptoErrorCode
  | ObjectStoreErrorCode
  | AccessLedgerErrorCode
  | VaultErrorCode;

export type ErrorCode = ApiErrorCode | DomainErrorCode;

/**
 * HTTP status per code. A 500 is an internal failure: its message is
 * replaced and the error is logged.
 */
export const ERROR_STATUS: Readonly<Record<ErrorCode, ContentfulStatusCode>> = {
  // Request shape
  VALIDATION_ERROR: 400,
  INVALID_REQUEST: 400,
  INVALID_OBJECT_ID: 400,
  INVALID_ACTOR_ID: 400,
  INVALID_ACTION: 400,
  INVALID_QUERY: 400,
  PAYLOAD_TOO_LARGE: 413,

  // Lookup
  NOT_FOUND: 404,

  // Decryption and verification
  AUTHENTICATION_FAILED: 422,
  KEY_UNWRAP_FAILED: 422,
  INTEGRITY_FAILED: 422,

  // Server side
  KEY_GENERATION_FAILED: 500,
  INVALID_KEY: 500,
  CORRUPT_RECORD: 500,
  INVALID_TRANSITION: 500,
  INPUT_UNAVAILABLE: 500,
  INTERNAL_ERROR: 500,
};

export function isErrorCode(value: string): value is ErrorCode {
  return Object.hasOwn(ERROR_STATUS, value);
}

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return details === undefined
    ? { error: { code, message } }
    : { error: { code, message, details } };
}
