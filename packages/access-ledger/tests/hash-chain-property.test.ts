/**
 * Property-based tests for ledger chain integrity.
 *
 * Uses fast-check to verify invariants:
 * 1. Any N records → valid chain with contiguous sequences
 * 2. Remove any record → breaks chain
 * 3. Modify any record → breaks chain
 * 4. verifyIntegrity() is idempotent
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { AccessAction, AccessOutcome } from "@strongbox/types";
import { InMemoryAccessLedger } from "../src/in-memory-ledger.js";
import { verifyLedgerChain } from "../src/hash-chain.js";

// =============================================================================
// Arbitraries
// =============================================================================

interface RecordInput {
  readonly actorId: string;
  readonly objectId: string;
  readonly action: AccessAction;
  readonly outcome: AccessOutcome | undefined;
}

const arbRecordInput: fc.Arbitrary<RecordInput> = fc.record({
  actorId: fc.constantFrom("alice", "bob", "carol"),
  objectId: fc.stringMatching(/^[a-z0-9/._-]{1,32}$/),
  action: fc.constantFrom<AccessAction>("upload", "download", "delete"),
  outcome: fc.constantFrom<AccessOutcome | undefined>(
    undefined,
    "ok",
    "integrity_failed",
    "decrypt_failed",
  ),
});

function fill(inputs: readonly RecordInput[]): InMemoryAccessLedger {
  const ledger = new InMemoryAccessLedger();
  for (const input of inputs) {
    ledger.record(input.actorId, input.objectId, input.action, {
      outcome: input.outcome,
    });
  }
  return ledger;
}

// =============================================================================
// Tests
// =============================================================================

describe("ledger chain property tests", () => {
  it("any N records produce a valid, contiguous chain", () => {
    fc.assert(
      fc.property(fc.array(arbRecordInput, { minLength: 1, maxLength: 20 }), (inputs) => {
        const ledger = fill(inputs);

        expect(ledger.verifyIntegrity().valid).toBe(true);
        expect(ledger.query().map((r) => r.sequence)).toEqual(
          inputs.map((_, i) => i + 1),
        );
      }),
      { numRuns: 50 },
    );
  });

  it("removing any record but the last breaks the chain", () => {
    fc.assert(
      fc.property(
        fc.array(arbRecordInput, { minLength: 2, maxLength: 10 }),
        fc.nat(),
        (inputs, removeIndex) => {
          const records = [...fill(inputs).query()];
          const idx = removeIndex % (records.length - 1);
          records.splice(idx, 1);

          expect(verifyLedgerChain(records).valid).toBe(false);
        },
      ),
      { numRuns: 30 },
    );
  });

  it("changing the actor of any record breaks the chain", () => {
    fc.assert(
      fc.property(
        fc.array(arbRecordInput, { minLength: 1, maxLength: 10 }),
        fc.nat(),
        (inputs, modifyIndex) => {
          const records = [...fill(inputs).query()];
          const idx = modifyIndex % records.length;
          const original = records[idx];
          if (original === undefined) return;
          records[idx] = { ...original, actorId: `${original.actorId}-forged` };

          expect(verifyLedgerChain(records).valid).toBe(false);
        },
      ),
      { numRuns: 30 },
    );
  });

  it("verifyIntegrity is idempotent", () => {
    fc.assert(
      fc.property(fc.array(arbRecordInput, { maxLength: 10 }), (inputs) => {
        const ledger = fill(inputs);
        const r1 = ledger.verifyIntegrity();
        const r2 = ledger.verifyIntegrity();

        expect(r1).toEqual(r2);
        expect(r1.lastVerifiedSequence).toBe(inputs.length);
      }),
      { numRuns: 30 },
    );
  });
});
