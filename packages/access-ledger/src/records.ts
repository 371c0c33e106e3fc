/**
 * Record construction and filtering shared by the ledger implementations.
 */

import { isAccessAction, isObjectId } from "@strongbox/types";
import type { AccessAction, AccessRecord } from "@strongbox/types";
import { computeRecordHash, GENESIS_HASH } from "./hash-chain.js";
import type { AccessRecordBody } from "./hash-chain.js";
import type { AccessQuery, RecordOptions } from "./types.js";
import { AccessLedgerError } from "./types.js";

export const MAX_ACTOR_ID_LENGTH = 256;

/**
 * Build the next record after `previous` (undefined for the first).
 *
 * @throws AccessLedgerError for an invalid actor, object or action
 */
export function createAccessRecord(
  previous: AccessRecord | undefined,
  actorId: string,
  objectId: string,
  action: AccessAction,
  options: RecordOptions | undefined,
  timestamp: string,
): AccessRecord {
  if (actorId.length === 0 || actorId.length > MAX_ACTOR_ID_LENGTH) {
    throw new AccessLedgerError(
      "INVALID_ACTOR_ID",
      `Actor ID must be 1-${MAX_ACTOR_ID_LENGTH} characters`,
    );
  }
  if (!isObjectId(objectId)) {
    throw new AccessLedgerError(
      "INVALID_OBJECT_ID",
      `Object ID "${objectId}" is not valid`,
    );
  }
  if (!isAccessAction(action)) {
    throw new AccessLedgerError(
      "INVALID_ACTION",
      `Unknown access action: ${String(action)}`,
    );
  }

  const previousHash = previous?.hash ?? GENESIS_HASH;
  const body: AccessRecordBody = {
    sequence: (previous?.sequence ?? 0) + 1,
    actorId,
    objectId,
    action,
    timestamp,
    ...(options?.outcome !== undefined ? { outcome: options.outcome } : {}),
  };

  return Object.freeze({
    ...body,
    hash: computeRecordHash(body, previousHash),
    previousHash,
  });
}

/**
 * Apply a query to records held in sequence order.
 */
export function filterRecords(
  records: readonly AccessRecord[],
  filter: AccessQuery = {},
): readonly AccessRecord[] {
  const fromSequence = filter.fromSequence ?? 1;
  if (!Number.isInteger(fromSequence) || fromSequence < 1) {
    throw new AccessLedgerError(
      "INVALID_QUERY",
      `fromSequence must be an integer >= 1, got ${fromSequence}`,
    );
  }
  if (filter.limit !== undefined && (!Number.isInteger(filter.limit) || filter.limit < 0)) {
    throw new AccessLedgerError(
      "INVALID_QUERY",
      `limit must be a non-negative integer, got ${filter.limit}`,
    );
  }

  const result = records.filter(
    (r) =>
      r.sequence >= fromSequence &&
      (filter.actorId === undefined || r.actorId === filter.actorId) &&
      (filter.objectId === undefined || r.objectId === filter.objectId) &&
      (filter.action === undefined || r.action === filter.action),
  );

  return filter.limit !== undefined ? result.slice(0, filter.limit) : result;
}
