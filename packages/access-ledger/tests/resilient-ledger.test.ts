/**
 * Tests for ResilientAccessLedger.
 *
 * Verifies:
 * - Successful appends pass through
 * - A failing append is retried, then dropped without throwing
 * - Drops are counted and reported
 */

import { describe, it, expect, vi } from "vitest";
import type { AccessAction, AccessRecord } from "@strongbox/types";
import { InMemoryAccessLedger } from "../src/in-memory-ledger.js";
import { ResilientAccessLedger } from "../src/resilient-ledger.js";
import type { LedgerFailure } from "../src/resilient-ledger.js";
import type { AccessLedger, RecordOptions } from "../src/types.js";

/**
 * Ledger whose first `failures` appends throw.
 */
class FlakyLedger implements AccessLedger {
  readonly inner = new InMemoryAccessLedger();
  attempts = 0;

  constructor(private failures: number) {}

  record(
    actorId: string,
    objectId: string,
    action: AccessAction,
    options?: RecordOptions,
  ): AccessRecord {
    this.attempts++;
    if (this.failures > 0) {
      this.failures--;
      throw new Error("disk full");
    }
    return this.inner.record(actorId, objectId, action, options);
  }

  query() {
    return this.inner.query();
  }

  get size(): number {
    return this.inner.size;
  }

  verifyIntegrity() {
    return this.inner.verifyIntegrity();
  }
}

describe("ResilientAccessLedger", () => {
  it("passes successful appends through", () => {
    const flaky = new FlakyLedger(0);
    const ledger = new ResilientAccessLedger(flaky);

    const record = ledger.record("alice", "obj1", "upload");
    expect(record?.sequence).toBe(1);
    expect(ledger.size).toBe(1);
    expect(ledger.droppedCount).toBe(0);
  });

  it("retries a failed append", () => {
    const flaky = new FlakyLedger(1);
    const ledger = new ResilientAccessLedger(flaky);

    expect(ledger.record("alice", "obj1", "upload")?.sequence).toBe(1);
    expect(flaky.attempts).toBe(2);
    expect(ledger.droppedCount).toBe(0);
  });

  it("drops the record after maxAttempts and does not throw", () => {
    const flaky = new FlakyLedger(5);
    const onFailure = vi.fn<(failure: LedgerFailure) => void>();
    const ledger = new ResilientAccessLedger(flaky, { maxAttempts: 3, onFailure });

    const result = ledger.record("bob", "obj1", "download", { outcome: "ok" });

    expect(result).toBeUndefined();
    expect(flaky.attempts).toBe(3);
    expect(ledger.droppedCount).toBe(1);
    expect(ledger.size).toBe(0);
    expect(onFailure).toHaveBeenCalledTimes(1);

    const failure = onFailure.mock.calls[0]?.[0];
    expect(failure?.actorId).toBe("bob");
    expect(failure?.objectId).toBe("obj1");
    expect(failure?.action).toBe("download");
    expect(failure?.outcome).toBe("ok");
    expect(failure?.attempts).toBe(3);
    expect(failure?.error).toBeInstanceOf(Error);
  });

  it("defaults to two attempts", () => {
    const flaky = new FlakyLedger(2);
    const ledger = new ResilientAccessLedger(flaky);

    expect(ledger.record("alice", "obj1", "upload")).toBeUndefined();
    expect(flaky.attempts).toBe(2);
  });

  it("keeps counting drops and recovers when the ledger does", () => {
    const flaky = new FlakyLedger(4);
    const ledger = new ResilientAccessLedger(flaky);

    ledger.record("alice", "obj1", "upload");
    ledger.record("alice", "obj2", "upload");
    const third = ledger.record("alice", "obj3", "upload");

    expect(ledger.droppedCount).toBe(2);
    expect(third?.objectId).toBe("obj3");
    expect(ledger.verifyIntegrity().valid).toBe(true);
  });

  it("rejects maxAttempts below 1", () => {
    expect(
      () => new ResilientAccessLedger(new FlakyLedger(0), { maxAttempts: 0 }),
    ).toThrow(RangeError);
  });
});
