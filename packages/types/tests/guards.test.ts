/**
 * Runtime type guard tests for @strongbox/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  MAX_OBJECT_ID_LENGTH,
  isObjectId,
  isEnvelope,
  isStoredObject,
  isAccessAction,
  isAccessOutcome,
  isAccessRecord,
} from "../src/guards.js";

function makeEnvelope(): Record<string, unknown> {
  return {
    encryptedKey: new Uint8Array([1, 2, 3]),
    ciphertext: new Uint8Array([4, 5]),
    nonce: new Uint8Array(12),
    authTag: new Uint8Array(16),
    contentDigest: new Uint8Array(32),
  };
}

function makeRecord(): Record<string, unknown> {
  return {
    sequence: 1,
    actorId: "alice",
    objectId: "obj1",
    action: "upload",
    timestamp: "2026-01-01T00:00:00.000Z",
    hash: "ab",
    previousHash: "genesis",
  };
}

// =============================================================================
// Object ID
// =============================================================================

describe("isObjectId", () => {
  it("accepts ordinary ids", () => {
    expect(isObjectId("obj1")).toBe(true);
    expect(isObjectId("reports/2026/q1.pdf")).toBe(true);
  });

  it("accepts an id at the length limit", () => {
    expect(isObjectId("a".repeat(MAX_OBJECT_ID_LENGTH))).toBe(true);
  });

  it("rejects empty and over-long ids", () => {
    expect(isObjectId("")).toBe(false);
    expect(isObjectId("a".repeat(MAX_OBJECT_ID_LENGTH + 1))).toBe(false);
  });

  it("rejects control characters", () => {
    expect(isObjectId("obj\n1")).toBe(false);
    expect(isObjectId("obj\u00001")).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isObjectId(42)).toBe(false);
    expect(isObjectId(null)).toBe(false);
  });
});

// =============================================================================
// Envelope guards
// =============================================================================

describe("isEnvelope", () => {
  it("accepts an envelope of byte arrays", () => {
    expect(isEnvelope(makeEnvelope())).toBe(true);
  });

  it("accepts Buffers", () => {
    const env = makeEnvelope();
    env.ciphertext = Buffer.from("abc");
    expect(isEnvelope(env)).toBe(true);
  });

  it("rejects a missing field", () => {
    const env = makeEnvelope();
    delete env.authTag;
    expect(isEnvelope(env)).toBe(false);
  });

  it("rejects base64 strings in place of bytes", () => {
    const env = makeEnvelope();
    env.nonce = "AAAAAAAAAAAAAAAA";
    expect(isEnvelope(env)).toBe(false);
  });

  it("rejects null", () => {
    expect(isEnvelope(null)).toBe(false);
  });
});

describe("isStoredObject", () => {
  it("accepts a stored object", () => {
    expect(
      isStoredObject({
        objectId: "obj1",
        envelope: makeEnvelope(),
        createdAt: "2026-01-01T00:00:00.000Z",
      }),
    ).toBe(true);
  });

  it("rejects an invalid object id", () => {
    expect(
      isStoredObject({
        objectId: "",
        envelope: makeEnvelope(),
        createdAt: "2026-01-01T00:00:00.000Z",
      }),
    ).toBe(false);
  });

  it("rejects a missing createdAt", () => {
    expect(isStoredObject({ objectId: "obj1", envelope: makeEnvelope() })).toBe(false);
  });
});

// =============================================================================
// Access guards
// =============================================================================

describe("isAccessAction", () => {
  it("accepts known actions", () => {
    expect(isAccessAction("upload")).toBe(true);
    expect(isAccessAction("download")).toBe(true);
    expect(isAccessAction("delete")).toBe(true);
  });

  it("rejects unknown actions", () => {
    expect(isAccessAction("rename")).toBe(false);
    expect(isAccessAction(undefined)).toBe(false);
  });
});

describe("isAccessOutcome", () => {
  it("accepts known outcomes", () => {
    expect(isAccessOutcome("ok")).toBe(true);
    expect(isAccessOutcome("integrity_failed")).toBe(true);
    expect(isAccessOutcome("decrypt_failed")).toBe(true);
  });

  it("rejects unknown outcomes", () => {
    expect(isAccessOutcome("maybe")).toBe(false);
  });
});

describe("isAccessRecord", () => {
  it("accepts a record without outcome", () => {
    expect(isAccessRecord(makeRecord())).toBe(true);
  });

  it("accepts a record with outcome", () => {
    expect(isAccessRecord({ ...makeRecord(), action: "download", outcome: "ok" })).toBe(true);
  });

  it("rejects a non-positive sequence", () => {
    expect(isAccessRecord({ ...makeRecord(), sequence: 0 })).toBe(false);
    expect(isAccessRecord({ ...makeRecord(), sequence: 1.5 })).toBe(false);
  });

  it("rejects an unknown outcome", () => {
    expect(isAccessRecord({ ...makeRecord(), outcome: "partial" })).toBe(false);
  });

  it("rejects missing hash fields", () => {
    const record = makeRecord();
    delete record.hash;
    expect(isAccessRecord(record)).toBe(false);
  });
});
