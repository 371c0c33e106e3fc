/**
 * @strongbox/access-ledger — Core types.
 *
 * Defines the interfaces for the append-only access record.
 *
 * Design principles:
 * - Records are immutable after creation
 * - The ledger is append-only (no UPDATE, no DELETE)
 * - Sequence numbers are contiguous (1, 2, 3, ...) with no gaps
 * - Every record is hash-linked to its predecessor
 */

import type {
  AccessAction,
  AccessOutcome,
  AccessRecord,
} from "@strongbox/types";

// =============================================================================
// Record / Query Options
// =============================================================================

export interface RecordOptions {
  /** How a download ended. Omitted for upload and delete. */
  readonly outcome?: AccessOutcome | undefined;
}

/**
 * Filter for reading records back. All criteria are ANDed.
 */
export interface AccessQuery {
  readonly actorId?: string | undefined;
  readonly objectId?: string | undefined;
  readonly action?: AccessAction | undefined;

  /** Start at this sequence (inclusive, 1-based). Default: 1 */
  readonly fromSequence?: number | undefined;

  /** Maximum number of records to return. Default: unlimited */
  readonly limit?: number | undefined;
}

// =============================================================================
// Integrity
// =============================================================================

export interface LedgerChainBreak {
  readonly sequence: number;
  readonly reason: string;
}

export interface LedgerIntegrityResult {
  readonly valid: boolean;

  /** Sequence of the last record checked, or 0 for an empty ledger */
  readonly lastVerifiedSequence: number;

  readonly errors: readonly LedgerChainBreak[];
}

// =============================================================================
// Access Ledger Interface
// =============================================================================

/**
 * Append-only ledger of object accesses.
 *
 * Invariants:
 * - Records are immutable once appended
 * - Sequences are contiguous with no gaps
 * - `query` returns records oldest-first
 * - `record` either appends one whole record or throws
 */
export interface AccessLedger {
  /**
   * Append one record.
   *
   * @returns The appended record, with sequence, timestamp and hashes
   * @throws AccessLedgerError if the record is invalid or cannot be written
   */
  record(
    actorId: string,
    objectId: string,
    action: AccessAction,
    options?: RecordOptions,
  ): AccessRecord;

  /** Records matching `filter`, oldest first. */
  query(filter?: AccessQuery): readonly AccessRecord[];

  /** Number of records. */
  readonly size: number;

  /** Recompute the hash chain over every record. */
  verifyIntegrity(): LedgerIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type AccessLedgerErrorCode =
  | "INVALID_ACTOR_ID"
  | "INVALID_OBJECT_ID"
  | "INVALID_ACTION"
  | "INVALID_QUERY";

/**
 * Error thrown by AccessLedger operations.
 */
export class AccessLedgerError extends Error {
  constructor(
    public readonly code: AccessLedgerErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "AccessLedgerError";
  }
}
