/**
 * @strongbox/crypto — Primitive bindings.
 *
 * The cipher, key-wrap, hash and random primitives the envelope is
 * built from. Consumed, not reimplemented: the default binding is
 * Node's OpenSSL-backed `node:crypto`.
 *
 * Parameters:
 * - AEAD: AES-256-GCM, 256-bit key, 96-bit nonce, 128-bit tag
 * - Key wrap: RSA-OAEP with SHA-256, 3072-bit modulus, e = 65537
 * - Digest: SHA-256
 */

import {
  constants,
  createCipheriv,
  createDecipheriv,
  createHash,
  createPrivateKey,
  createPublicKey,
  generateKeyPairSync,
  privateDecrypt,
  publicEncrypt,
  randomBytes,
} from "node:crypto";
import { asBuffer, wipe } from "./key-material.js";

// =============================================================================
// Parameters
// =============================================================================

export const AEAD_ALGORITHM = "aes-256-gcm" as const;
export const SYMMETRIC_KEY_BYTES = 32;
export const NONCE_BYTES = 12; // NIST recommendation for GCM
export const TAG_BYTES = 16;

export const RSA_MODULUS_BITS = 3072;
export const RSA_PUBLIC_EXPONENT = 0x10001;
export const OAEP_HASH = "sha256";

export const DIGEST_ALGORITHM = "sha256";
export const DIGEST_BYTES = 32;

// =============================================================================
// Interface
// =============================================================================

export interface AeadSealed {
  readonly ciphertext: Buffer;
  readonly tag: Buffer;
}

export interface DerKeyPair {
  /** SPKI, DER */
  readonly publicKey: Buffer;
  /** PKCS#8, DER */
  readonly privateKey: Buffer;
}

/**
 * The primitives an envelope needs.
 *
 * Every method throws on failure; callers map failures onto the
 * crypto error taxonomy.
 */
export interface CryptoPrimitives {
  randomBytes(size: number): Buffer;
  aeadEncrypt(key: Uint8Array, nonce: Uint8Array, plaintext: Uint8Array): AeadSealed;
  /** Throws if the tag does not verify; nothing is returned in that case. */
  aeadDecrypt(
    key: Uint8Array,
    nonce: Uint8Array,
    ciphertext: Uint8Array,
    tag: Uint8Array,
  ): Buffer;
  generateKeyPair(modulusBits: number): DerKeyPair;
  publicEncrypt(publicKey: Uint8Array, data: Uint8Array): Buffer;
  privateDecrypt(privateKey: Uint8Array, data: Uint8Array): Buffer;
  hash(data: Uint8Array): Buffer;
}

// =============================================================================
// node:crypto binding
// =============================================================================

export const nodePrimitives: CryptoPrimitives = {
  randomBytes(size) {
    return randomBytes(size);
  },

  aeadEncrypt(key, nonce, plaintext) {
    const cipher = createCipheriv(AEAD_ALGORITHM, key, nonce, {
      authTagLength: TAG_BYTES,
    });
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    return { ciphertext, tag: cipher.getAuthTag() };
  },

  aeadDecrypt(key, nonce, ciphertext, tag) {
    const decipher = createDecipheriv(AEAD_ALGORITHM, key, nonce, {
      authTagLength: TAG_BYTES,
    });
    // Tag first: final() throws if it does not match.
    decipher.setAuthTag(tag);

    const head = decipher.update(ciphertext);
    try {
      const tail = decipher.final();
      return Buffer.concat([head, tail]);
    } finally {
      // Unauthenticated output never leaves this function.
      wipe(head);
    }
  },

  generateKeyPair(modulusBits) {
    return generateKeyPairSync("rsa", {
      modulusLength: modulusBits,
      publicExponent: RSA_PUBLIC_EXPONENT,
      publicKeyEncoding: { type: "spki", format: "der" },
      privateKeyEncoding: { type: "pkcs8", format: "der" },
    });
  },

  publicEncrypt(publicKey, data) {
    const key = createPublicKey({
      key: asBuffer(publicKey),
      format: "der",
      type: "spki",
    });
    return publicEncrypt(
      { key, padding: constants.RSA_PKCS1_OAEP_PADDING, oaepHash: OAEP_HASH },
      data,
    );
  },

  privateDecrypt(privateKey, data) {
    const key = createPrivateKey({
      key: asBuffer(privateKey),
      format: "der",
      type: "pkcs8",
    });
    return privateDecrypt(
      { key, padding: constants.RSA_PKCS1_OAEP_PADDING, oaepHash: OAEP_HASH },
      data,
    );
  },

  hash(data) {
    return createHash(DIGEST_ALGORITHM).update(data).digest();
  },
};
