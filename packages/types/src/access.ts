/**
 * Access Types
 *
 * Append-only record of who did what to which object, and when.
 *
 * Rules:
 * - Records are immutable after creation
 * - Records are never deleted
 * - Every record links to its predecessor by hash
 */

/**
 * What an actor did to an object.
 */
export type AccessAction = "upload" | "download" | "delete";

/**
 * How a download ended, when it reached the object.
 */
export type AccessOutcome = "ok" | "integrity_failed" | "decrypt_failed";

/**
 * A single ledger record.
 */
export interface AccessRecord {
  /** Position in the ledger (1-based, contiguous) */
  readonly sequence: number;

  readonly actorId: string;
  readonly objectId: string;
  readonly action: AccessAction;

  /** ISO 8601 timestamp assigned at append */
  readonly timestamp: string;

  readonly outcome?: AccessOutcome | undefined;

  /** SHA-256 over the canonical record body and `previousHash` */
  readonly hash: string;

  /** Hash of the preceding record, or "genesis" */
  readonly previousHash: string;
}
