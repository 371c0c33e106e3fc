/**
 * @strongbox/types — Shared domain types for the Strongbox stack.
 *
 * These types are used across all Strongbox packages:
 * - Key material
 * - Envelopes and stored objects
 * - Access records
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Key types
export type { Keypair } from "./keys.js";

// Envelope types
export type { Envelope, StoredObject } from "./envelope.js";

// Access types
export type {
  AccessAction,
  AccessOutcome,
  AccessRecord,
} from "./access.js";

// Runtime type guards
export {
  MAX_OBJECT_ID_LENGTH,
  isObjectId,
  isEnvelope,
  isStoredObject,
  isAccessAction,
  isAccessOutcome,
  isAccessRecord,
} from "./guards.js";
