/**
 * Envelope Types
 *
 * A hybrid-encryption envelope: bulk data under a fresh symmetric key,
 * that key wrapped under the recipient's public key.
 *
 * Rules:
 * - An envelope is a value: created once by the codec, never mutated
 * - `authTag` authenticates exactly `ciphertext` under `nonce`
 * - `contentDigest` covers the original plaintext and is checked
 *   separately from the AEAD tag
 */

/**
 * The five fields of a sealed object.
 */
export interface Envelope {
  /** Symmetric key wrapped under the recipient public key */
  readonly encryptedKey: Uint8Array;

  /** AEAD ciphertext of the plaintext */
  readonly ciphertext: Uint8Array;

  /** AEAD nonce, unique per symmetric-key use */
  readonly nonce: Uint8Array;

  /** AEAD authentication tag over `ciphertext` */
  readonly authTag: Uint8Array;

  /** Hash of the original plaintext */
  readonly contentDigest: Uint8Array;
}

/**
 * An envelope as held by an object store.
 */
export interface StoredObject {
  /** Unique key within the store */
  readonly objectId: string;

  readonly envelope: Envelope;

  /** ISO 8601 timestamp of the write that produced this object */
  readonly createdAt: string;
}
