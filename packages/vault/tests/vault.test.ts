/**
 * Tests for Vault — upload/download coordinator.
 *
 * Integration tests over the real codec, an in-memory object store
 * and an in-memory access ledger.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import type { AccessRecord, Envelope } from "@strongbox/types";
import {
  AuthenticationError,
  EnvelopeCodec,
  InvalidKeyError,
  KeypairManager,
  KeyUnwrapError,
} from "@strongbox/crypto";
import { InMemoryObjectStore, NotFoundError, ObjectStoreError } from "@strongbox/object-store";
import { InMemoryAccessLedger, MAX_ACTOR_ID_LENGTH } from "@strongbox/access-ledger";
import type { AccessLedger, LedgerFailure } from "@strongbox/access-ledger";
import { Vault } from "../src/vault.js";
import { IntegrityError, VaultError } from "../src/errors.js";

// =============================================================================
// Helpers
// =============================================================================

const keys = new KeypairManager();
const owner = keys.generateKeypair();
const stranger = keys.generateKeypair();
const HELLO = Buffer.from("hello world", "utf-8");
const AT = "2026-03-01T12:00:00.000Z";

let store: InMemoryObjectStore;
let ledger: InMemoryAccessLedger;
let vault: Vault;

beforeEach(() => {
  store = new InMemoryObjectStore();
  ledger = new InMemoryAccessLedger();
  vault = new Vault({ store, ledger, clock: () => new Date(AT) });
});

function upload(objectId: string, plaintext: Uint8Array = HELLO) {
  return vault.upload({
    actorId: "alice",
    objectId,
    plaintext,
    recipientPublicKey: owner.publicKey,
  });
}

function download(objectId: string, privateKey: Uint8Array = owner.privateKey) {
  return vault.download({ actorId: "bob", objectId, privateKey });
}

function replaceStored(objectId: string, change: (envelope: Envelope) => Envelope): void {
  store.store(objectId, change(store.retrieve(objectId)));
}

function flipFirst(bytes: Uint8Array): Buffer {
  const copy = Buffer.from(bytes);
  copy[0] = (copy[0] ?? 0) ^ 0xff;
  return copy;
}

function states(trace: readonly { readonly to: string }[]): string[] {
  return trace.map((t) => t.to);
}

/**
 * Ledger that always fails to append.
 */
class BrokenLedger implements AccessLedger {
  attempts = 0;

  record(): AccessRecord {
    this.attempts++;
    throw new Error("ledger offline");
  }

  query(): readonly AccessRecord[] {
    return [];
  }

  get size(): number {
    return 0;
  }

  verifyIntegrity() {
    return { valid: true, lastVerifiedSequence: 0, errors: [] };
  }
}

// =============================================================================
// Round trip
// =============================================================================

describe("round trip", () => {
  it("uploads and downloads 'hello world' through obj1", () => {
    upload("obj1");
    const result = download("obj1");

    expect(result.objectId).toBe("obj1");
    expect(result.plaintext.toString("utf-8")).toBe("hello world");
  });

  it("stores only the envelope", () => {
    upload("obj1");
    const envelope = store.retrieve("obj1");

    expect(envelope.ciphertext.length).toBe(HELLO.length);
    expect(Buffer.from(envelope.ciphertext).equals(HELLO)).toBe(false);
  });

  it("traces the upload states", () => {
    const result = upload("obj1");
    expect(result.trace).toEqual([
      { from: "created", to: "encrypted", at: AT },
      { from: "encrypted", to: "stored", at: AT },
    ]);
    expect(result.stored.objectId).toBe("obj1");
  });

  it("traces the download states", () => {
    upload("obj1");
    expect(states(download("obj1").trace)).toEqual(["retrieved", "decrypted", "verified"]);
  });

  it("round-trips empty content", () => {
    upload("empty", new Uint8Array(0));
    expect(download("empty").plaintext.length).toBe(0);
  });

  it("returns the most recent upload after an overwrite", () => {
    upload("obj1", Buffer.from("first"));
    upload("obj1", Buffer.from("second"));

    expect(download("obj1").plaintext.toString("utf-8")).toBe("second");
    expect(store.size).toBe(1);
  });
});

// =============================================================================
// Access records
// =============================================================================

describe("access records", () => {
  it("records the upload and the verified download", () => {
    const uploaded = upload("obj1");
    const downloaded = download("obj1");

    expect(uploaded.record?.action).toBe("upload");
    expect(uploaded.record?.actorId).toBe("alice");
    expect(downloaded.record?.action).toBe("download");
    expect(downloaded.record?.actorId).toBe("bob");
    expect(downloaded.record?.outcome).toBe("ok");
    expect(ledger.size).toBe(2);
  });

  it("records a deletion", () => {
    upload("obj1");
    const removed = vault.remove({ actorId: "carol", objectId: "obj1" });

    expect(removed.record?.action).toBe("delete");
    expect(store.has("obj1")).toBe(false);
    expect(ledger.query({ action: "delete" })).toHaveLength(1);
  });

  it("keeps a valid chain across operations", () => {
    upload("obj1");
    download("obj1");
    vault.remove({ actorId: "alice", objectId: "obj1" });

    expect(vault.ledger.verifyIntegrity().valid).toBe(true);
  });
});

// =============================================================================
// Failures
// =============================================================================

describe("not found", () => {
  it("download of 'missing' raises NotFoundError", () => {
    expect(() => download("missing")).toThrow(NotFoundError);
  });

  it("records nothing when the object was never reached", () => {
    expect(() => download("missing")).toThrow(NotFoundError);
    expect(ledger.size).toBe(0);
  });

  it("remove of an absent object raises NotFoundError and records nothing", () => {
    expect(() => vault.remove({ actorId: "alice", objectId: "missing" })).toThrow(NotFoundError);
    expect(ledger.size).toBe(0);
  });
});

describe("tampering", () => {
  it("one flipped ciphertext byte raises AuthenticationError", () => {
    upload("obj1");
    replaceStored("obj1", (e) => ({ ...e, ciphertext: flipFirst(e.ciphertext) }));

    expect(() => download("obj1")).toThrow(AuthenticationError);
  });

  it("records the failed download as decrypt_failed", () => {
    upload("obj1");
    replaceStored("obj1", (e) => ({ ...e, authTag: flipFirst(e.authTag) }));

    expect(() => download("obj1")).toThrow(AuthenticationError);
    expect(ledger.query({ action: "download" })[0]?.outcome).toBe("decrypt_failed");
  });

  it("the wrong private key raises KeyUnwrapError", () => {
    upload("obj1");
    expect(() => download("obj1", stranger.privateKey)).toThrow(KeyUnwrapError);
    expect(ledger.query({ action: "download" })[0]?.outcome).toBe("decrypt_failed");
  });
});

describe("integrity", () => {
  it("an authentic envelope with a foreign digest raises IntegrityError", () => {
    upload("obj1");
    replaceStored("obj1", (e) => ({ ...e, contentDigest: Buffer.alloc(32, 0xab) }));

    expect(() => download("obj1")).toThrow(IntegrityError);
  });

  it("reports the digest mismatch separately from tampering", () => {
    // Sealed by hand with a digest that does not belong to the plaintext:
    // the AEAD layer is satisfied, only the digest check can catch it.
    const honest = new EnvelopeCodec().encrypt(HELLO, owner.publicKey);
    store.store("obj1", { ...honest, contentDigest: Buffer.alloc(32) });

    const outcome = vault.tryDownload({ actorId: "bob", objectId: "obj1", privateKey: owner.privateKey });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(IntegrityError);
    expect(outcome.error.code).toBe("INTEGRITY_FAILED");
    expect(outcome.failedAt).toBe("decrypted");
    expect(states(outcome.trace)).toEqual(["retrieved", "decrypted", "verification_failed"]);
    expect(outcome.record?.outcome).toBe("integrity_failed");
  });
});

// =============================================================================
// tryDownload
// =============================================================================

describe("tryDownload", () => {
  it("returns the plaintext on success", () => {
    upload("obj1");
    const outcome = vault.tryDownload({ actorId: "bob", objectId: "obj1", privateKey: owner.privateKey });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.plaintext.toString("utf-8")).toBe("hello world");
  });

  it("reports a missing object as failed in stored", () => {
    const outcome = vault.tryDownload({ actorId: "bob", objectId: "missing", privateKey: owner.privateKey });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(NotFoundError);
    expect(outcome.failedAt).toBe("stored");
    expect(states(outcome.trace)).toEqual(["failed"]);
    expect(outcome.record).toBeUndefined();
  });

  it("reports a wrong key as failed in retrieved", () => {
    upload("obj1");
    const outcome = vault.tryDownload({ actorId: "bob", objectId: "obj1", privateKey: stranger.privateKey });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(KeyUnwrapError);
    expect(outcome.failedAt).toBe("retrieved");
    expect(states(outcome.trace)).toEqual(["retrieved", "failed"]);
  });
});

// =============================================================================
// Ledger isolation
// =============================================================================

describe("ledger failures", () => {
  it("never fail the operation being recorded", () => {
    const broken = new BrokenLedger();
    const onLedgerFailure = vi.fn<(failure: LedgerFailure) => void>();
    vault = new Vault({ store, ledger: broken, onLedgerFailure });

    const uploaded = upload("obj1");
    const downloaded = download("obj1");

    expect(uploaded.record).toBeUndefined();
    expect(downloaded.plaintext.toString("utf-8")).toBe("hello world");
    expect(onLedgerFailure).toHaveBeenCalledTimes(2);
    expect(vault.ledger.droppedCount).toBe(2);
    expect(broken.attempts).toBe(4);
  });

  it("honour ledgerMaxAttempts", () => {
    const broken = new BrokenLedger();
    vault = new Vault({ store, ledger: broken, ledgerMaxAttempts: 5 });

    upload("obj1");
    expect(broken.attempts).toBe(5);
  });

  it("do not hide a crypto failure", () => {
    vault = new Vault({ store, ledger: new BrokenLedger() });
    upload("obj1");
    replaceStored("obj1", (e) => ({ ...e, nonce: flipFirst(e.nonce) }));

    expect(() => download("obj1")).toThrow(AuthenticationError);
  });
});

// =============================================================================
// Input validation
// =============================================================================

describe("input validation", () => {
  it("rejects an empty actor", () => {
    expect(() =>
      vault.upload({ actorId: "", objectId: "obj1", plaintext: HELLO, recipientPublicKey: owner.publicKey }),
    ).toThrow(VaultError);
    expect(store.size).toBe(0);
  });

  it("rejects an actor the ledger could not record", () => {
    const actorId = "x".repeat(MAX_ACTOR_ID_LENGTH + 1);
    expect(() =>
      vault.upload({ actorId, objectId: "obj1", plaintext: HELLO, recipientPublicKey: owner.publicKey }),
    ).toThrow(`actorId must be 1-${MAX_ACTOR_ID_LENGTH} characters`);
    expect(() => vault.tryDownload({ actorId, objectId: "obj1", privateKey: owner.privateKey })).toThrow(VaultError);
    expect(store.size).toBe(0);
    expect(ledger.size).toBe(0);
    expect(vault.ledger.droppedCount).toBe(0);
  });

  it("accepts an actor at the length limit", () => {
    const actorId = "x".repeat(MAX_ACTOR_ID_LENGTH);
    const result = vault.upload({ actorId, objectId: "obj1", plaintext: HELLO, recipientPublicKey: owner.publicKey });
    expect(result.record?.actorId).toBe(actorId);
  });

  it("rejects an invalid object id without recording", () => {
    expect(() => upload("")).toThrow(ObjectStoreError);
    expect(ledger.size).toBe(0);
  });

  it("rejects an unusable recipient key before storing", () => {
    expect(() =>
      vault.upload({ actorId: "alice", objectId: "obj1", plaintext: HELLO, recipientPublicKey: new Uint8Array(8) }),
    ).toThrow(InvalidKeyError);
    expect(store.has("obj1")).toBe(false);
  });
});
