import { isObjectId, MAX_OBJECT_ID_LENGTH } from "@strongbox/types";
import type { Envelope } from "@strongbox/types";
import { ObjectStoreError } from "./types.js";

export function assertObjectId(objectId: string): void {
  if (!isObjectId(objectId)) {
    throw new ObjectStoreError(
      "INVALID_OBJECT_ID",
      `Object ID must be 1-${MAX_OBJECT_ID_LENGTH} characters without control characters`,
    );
  }
}

/**
 * Deep copy of an envelope into fresh Buffers.
 */
export function copyEnvelope(envelope: Envelope): Envelope {
  return Object.freeze({
    encryptedKey: Buffer.from(envelope.encryptedKey),
    ciphertext: Buffer.from(envelope.ciphertext),
    nonce: Buffer.from(envelope.nonce),
    authTag: Buffer.from(envelope.authTag),
    contentDigest: Buffer.from(envelope.contentDigest),
  });
}
