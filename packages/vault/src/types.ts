/**
 * @strongbox/vault — Types.
 */

import type { AccessRecord, StoredObject } from "@strongbox/types";
import type { AuthenticationError, KeyUnwrapError } from "@strongbox/crypto";
import type { NotFoundError } from "@strongbox/object-store";
import type { IntegrityError } from "./errors.js";

// =============================================================================
// Lifecycle
// =============================================================================

export type VaultState =
  | "created"
  | "encrypted"
  | "stored"
  | "retrieved"
  | "decrypted"
  | "verified"
  | "verification_failed"
  | "failed";

export interface VaultTransition {
  readonly from: VaultState;
  readonly to: VaultState;
  /** ISO 8601 */
  readonly at: string;
}

// =============================================================================
// Requests
// =============================================================================

export interface UploadRequest {
  readonly actorId: string;
  readonly objectId: string;
  readonly plaintext: Uint8Array;
  /** SPKI DER */
  readonly recipientPublicKey: Uint8Array;
}

export interface UploadFileRequest {
  readonly actorId: string;
  readonly objectId: string;
  readonly filePath: string;
  /** SPKI DER */
  readonly recipientPublicKey: Uint8Array;
}

export interface DownloadRequest {
  readonly actorId: string;
  readonly objectId: string;
  /** PKCS#8 DER */
  readonly privateKey: Uint8Array;
}

export interface RemoveRequest {
  readonly actorId: string;
  readonly objectId: string;
}

// =============================================================================
// Results
// =============================================================================

export interface UploadResult {
  readonly objectId: string;
  readonly stored: StoredObject;
  /** Undefined when the ledger append was dropped */
  readonly record: AccessRecord | undefined;
  readonly trace: readonly VaultTransition[];
}

export interface DownloadResult {
  readonly objectId: string;
  /** Authenticated and digest-verified */
  readonly plaintext: Buffer;
  readonly record: AccessRecord | undefined;
  readonly trace: readonly VaultTransition[];
}

export interface RemoveResult {
  readonly objectId: string;
  readonly record: AccessRecord | undefined;
}

/**
 * The ways a download can fail, by the state it failed in:
 * - `stored`: NotFoundError
 * - `retrieved`: KeyUnwrapError or AuthenticationError
 * - `decrypted`: IntegrityError
 */
export type DownloadFailure =
  | NotFoundError
  | KeyUnwrapError
  | AuthenticationError
  | IntegrityError;

export type DownloadOutcome =
  | ({ readonly ok: true } & DownloadResult)
  | {
      readonly ok: false;
      readonly objectId: string;
      readonly failedAt: VaultState;
      readonly error: DownloadFailure;
      readonly record: AccessRecord | undefined;
      readonly trace: readonly VaultTransition[];
    };
