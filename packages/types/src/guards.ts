/**
 * Runtime Type Guards
 *
 * Narrowing functions for Strongbox domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized data, files read back from disk).
 */

import type { AccessAction, AccessOutcome, AccessRecord } from "./access.js";
import type { Envelope, StoredObject } from "./envelope.js";

// =============================================================================
// Object ID
// =============================================================================

export const MAX_OBJECT_ID_LENGTH = 256;

// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/;

export function isObjectId(value: unknown): value is string {
  return (
    typeof value === "string" &&
    value.length > 0 &&
    value.length <= MAX_OBJECT_ID_LENGTH &&
    !CONTROL_CHARS.test(value)
  );
}

// =============================================================================
// Envelope guards
// =============================================================================

function isBytes(value: unknown): value is Uint8Array {
  return value instanceof Uint8Array;
}

export function isEnvelope(value: unknown): value is Envelope {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isBytes(v.encryptedKey) &&
    isBytes(v.ciphertext) &&
    isBytes(v.nonce) &&
    isBytes(v.authTag) &&
    isBytes(v.contentDigest)
  );
}

export function isStoredObject(value: unknown): value is StoredObject {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isObjectId(v.objectId) &&
    isEnvelope(v.envelope) &&
    typeof v.createdAt === "string"
  );
}

// =============================================================================
// Access guards
// =============================================================================

const ACCESS_ACTIONS = new Set<string>(["upload", "download", "delete"]);
const ACCESS_OUTCOMES = new Set<string>(["ok", "integrity_failed", "decrypt_failed"]);

export function isAccessAction(value: unknown): value is AccessAction {
  return typeof value === "string" && ACCESS_ACTIONS.has(value);
}

export function isAccessOutcome(value: unknown): value is AccessOutcome {
  return typeof value === "string" && ACCESS_OUTCOMES.has(value);
}

export function isAccessRecord(value: unknown): value is AccessRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.sequence === "number" &&
    Number.isInteger(v.sequence) &&
    v.sequence >= 1 &&
    typeof v.actorId === "string" &&
    typeof v.objectId === "string" &&
    isAccessAction(v.action) &&
    typeof v.timestamp === "string" &&
    (v.outcome === undefined || isAccessOutcome(v.outcome)) &&
    typeof v.hash === "string" &&
    typeof v.previousHash === "string"
  );
}
