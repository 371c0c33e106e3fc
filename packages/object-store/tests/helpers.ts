import type { Envelope } from "@strongbox/types";

export const FIXED_TIME = "2026-03-01T12:00:00.000Z";

export function fixedClock(): () => Date {
  return () => new Date(FIXED_TIME);
}

/**
 * An envelope with recognisable, non-cryptographic bytes.
 */
export function makeEnvelope(seed = 1): Envelope {
  return {
    encryptedKey: Buffer.alloc(384, seed),
    ciphertext: Buffer.from(`ciphertext-${seed}`, "utf-8"),
    nonce: Buffer.alloc(12, seed + 1),
    authTag: Buffer.alloc(16, seed + 2),
    contentDigest: Buffer.alloc(32, seed + 3),
  };
}

export function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return Buffer.from(a).equals(Buffer.from(b));
}

export function sameEnvelope(a: Envelope, b: Envelope): boolean {
  return (
    sameBytes(a.encryptedKey, b.encryptedKey) &&
    sameBytes(a.ciphertext, b.ciphertext) &&
    sameBytes(a.nonce, b.nonce) &&
    sameBytes(a.authTag, b.authTag) &&
    sameBytes(a.contentDigest, b.contentDigest)
  );
}
