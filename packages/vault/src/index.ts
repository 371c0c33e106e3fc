/**
 * @strongbox/vault — Encrypted object vault.
 *
 * Upload: encrypt → store → record.
 * Download: retrieve → decrypt → verify → record.
 *
 * Design rules:
 * - Collaborators are injected (no ambient singletons)
 * - Crypto and integrity failures are never downgraded
 * - A ledger failure never fails the operation being recorded
 * - Every operation reports its lifecycle trace
 */

export { Vault } from "./vault.js";
export type { VaultOptions } from "./vault.js";

export { OperationLifecycle, canTransition, isTerminal } from "./lifecycle.js";

export type { VaultErrorCode } from "./errors.js";
export { VaultError, InputUnavailableError, IntegrityError } from "./errors.js";

export type {
  VaultState,
  VaultTransition,
  UploadRequest,
  UploadFileRequest,
  DownloadRequest,
  RemoveRequest,
  UploadResult,
  DownloadResult,
  RemoveResult,
  DownloadFailure,
  DownloadOutcome,
} from "./types.js";
