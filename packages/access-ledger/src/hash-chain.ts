/**
 * @strongbox/access-ledger — Hash chain for a tamper-evident ledger.
 *
 * Each record is hashed using RFC 8785 (JCS) canonicalization + SHA-256.
 * The hash includes the previous record's hash, forming a chain:
 *
 *   record[1].hash = sha256(canonicalize(body[1]) + "genesis")
 *   record[n].hash = sha256(canonicalize(body[n]) + record[n-1].hash)
 *
 * Editing, removing or reordering any record breaks the chain from
 * that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { AccessRecord } from "@strongbox/types";
import type { LedgerChainBreak, LedgerIntegrityResult } from "./types.js";

/**
 * The `previousHash` of the first record.
 */
export const GENESIS_HASH = "genesis";

/**
 * The hashed part of a record: everything except the hashes themselves.
 */
export type AccessRecordBody = Omit<AccessRecord, "hash" | "previousHash">;

function canonicalRecordBody(body: AccessRecordBody): string {
  return canonicalize({
    sequence: body.sequence,
    actorId: body.actorId,
    objectId: body.objectId,
    action: body.action,
    timestamp: body.timestamp,
    // Absent outcome is hashed as absent, not as null
    ...(body.outcome !== undefined ? { outcome: body.outcome } : {}),
  });
}

/**
 * Hex SHA-256 of a record body chained to its predecessor's hash.
 */
export function computeRecordHash(
  body: AccessRecordBody,
  previousHash: string,
): string {
  const input = canonicalRecordBody(body) + previousHash;
  return createHash("sha256").update(input).digest("hex");
}

/**
 * Verify the hash chain of a ledger.
 *
 * Records must be in sequence order, starting from sequence 1.
 */
export function verifyLedgerChain(
  records: readonly AccessRecord[],
): LedgerIntegrityResult {
  const errors: LedgerChainBreak[] = [];
  let previousHash = GENESIS_HASH;
  let expectedSequence = 1;
  let lastVerifiedSequence = 0;

  for (const record of records) {
    if (record.sequence !== expectedSequence) {
      errors.push({
        sequence: record.sequence,
        reason: `Sequence gap: expected ${expectedSequence}, got ${record.sequence}`,
      });
    }

    if (record.previousHash !== previousHash) {
      errors.push({
        sequence: record.sequence,
        reason: `previousHash mismatch at sequence ${record.sequence}: expected "${previousHash}", got "${record.previousHash}"`,
      });
    }

    const expectedHash = computeRecordHash(record, record.previousHash);
    if (record.hash !== expectedHash) {
      errors.push({
        sequence: record.sequence,
        reason: `Hash mismatch at sequence ${record.sequence}: expected "${expectedHash}", got "${record.hash}"`,
      });
    }

    previousHash = record.hash;
    expectedSequence = record.sequence + 1;
    lastVerifiedSequence = record.sequence;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedSequence,
    errors,
  };
}
