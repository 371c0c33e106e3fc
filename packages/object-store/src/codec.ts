/**
 * @strongbox/object-store — Stored object serialization.
 *
 * Document layout (version 1):
 *
 *   {
 *     "v": 1,
 *     "objectId": "obj1",
 *     "createdAt": "2026-01-01T00:00:00.000Z",
 *     "envelope": {
 *       "encryptedKey": "<base64>",
 *       "ciphertext": "<base64>",
 *       "nonce": "<base64>",
 *       "authTag": "<base64>",
 *       "contentDigest": "<base64>"
 *     }
 *   }
 *
 * Byte fields are standard base64 with padding. Decoding is strict:
 * anything that would not re-encode to the same string is rejected,
 * so a document round-trips byte-exact or not at all.
 */

import { isObjectId } from "@strongbox/types";
import type { Envelope, StoredObject } from "@strongbox/types";
import { ObjectStoreError } from "./types.js";

export const STORED_OBJECT_VERSION = 1 as const;

type EnvelopeField = keyof Envelope;

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

// =============================================================================
// Encode
// =============================================================================

export interface StoredObjectDocument {
  readonly v: typeof STORED_OBJECT_VERSION;
  readonly objectId: string;
  readonly createdAt: string;
  readonly envelope: Readonly<Record<EnvelopeField, string>>;
}

/**
 * The JSON-ready document for a stored object.
 */
export function encodeStoredObject(object: StoredObject): StoredObjectDocument {
  const { envelope } = object;
  return {
    v: STORED_OBJECT_VERSION,
    objectId: object.objectId,
    createdAt: object.createdAt,
    envelope: {
      encryptedKey: toBase64(envelope.encryptedKey),
      ciphertext: toBase64(envelope.ciphertext),
      nonce: toBase64(envelope.nonce),
      authTag: toBase64(envelope.authTag),
      contentDigest: toBase64(envelope.contentDigest),
    },
  };
}

export function serializeStoredObject(object: StoredObject): string {
  return JSON.stringify(encodeStoredObject(object));
}

// =============================================================================
// Decode
// =============================================================================

/**
 * Parse a serialized stored object.
 *
 * @throws ObjectStoreError (CORRUPT_RECORD) if the text is not a valid document
 */
export function deserializeStoredObject(text: string): StoredObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw corrupt("Stored object is not valid JSON", undefined, err);
  }

  if (!isRecord(parsed)) {
    throw corrupt("Stored object must be a JSON object");
  }

  if (parsed.v !== STORED_OBJECT_VERSION) {
    throw corrupt(`Unsupported stored object version: ${String(parsed.v)}`);
  }

  const objectId = parsed.objectId;
  if (!isObjectId(objectId)) {
    throw corrupt("Stored object has an invalid objectId");
  }

  const createdAt = parsed.createdAt;
  if (typeof createdAt !== "string" || Number.isNaN(Date.parse(createdAt))) {
    throw corrupt("Stored object has an invalid createdAt", objectId);
  }

  const rawEnvelope = parsed.envelope;
  if (!isRecord(rawEnvelope)) {
    throw corrupt("Stored object is missing its envelope", objectId);
  }

  return {
    objectId,
    createdAt,
    envelope: Object.freeze({
      encryptedKey: decodeField(rawEnvelope, "encryptedKey", objectId),
      ciphertext: decodeField(rawEnvelope, "ciphertext", objectId),
      nonce: decodeField(rawEnvelope, "nonce", objectId),
      authTag: decodeField(rawEnvelope, "authTag", objectId),
      contentDigest: decodeField(rawEnvelope, "contentDigest", objectId),
    }),
  };
}

// ─── Internal ───────────────────────────────────────────────────────

function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function decodeField(
  envelope: Record<string, unknown>,
  field: EnvelopeField,
  objectId: string,
): Buffer {
  const value = envelope[field];
  if (typeof value !== "string" || !BASE64.test(value)) {
    throw corrupt(`Envelope field "${field}" is not base64`, objectId);
  }
  return Buffer.from(value, "base64");
}

function corrupt(
  message: string,
  objectId?: string,
  cause?: unknown,
): ObjectStoreError {
  return new ObjectStoreError(
    "CORRUPT_RECORD",
    message,
    objectId,
    cause === undefined ? undefined : { cause },
  );
}
