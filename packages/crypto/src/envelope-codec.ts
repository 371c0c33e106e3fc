/**
 * Envelope Codec — hybrid encryption of a single payload.
 *
 * Seal:
 *   1. Fresh 256-bit symmetric key per call
 *   2. Fresh 96-bit random nonce (the key is never reused, so a
 *      random nonce cannot collide under it)
 *   3. AES-256-GCM over the plaintext → ciphertext + tag
 *   4. RSA-OAEP(SHA-256) wrap of the symmetric key
 *   5. SHA-256 digest of the plaintext
 *
 * Open:
 *   1. RSA-OAEP unwrap → KeyUnwrapError
 *   2. AES-256-GCM decrypt, tag verified before anything is
 *      returned → AuthenticationError
 *
 * Open does not look at `contentDigest`. Checking it is the caller's
 * separate step (see IntegrityVerifier), so that "authentic but not
 * what was hashed" stays distinguishable from tampering.
 *
 * The symmetric key is zeroed on every exit path of both operations.
 */

import type { Envelope } from "@strongbox/types";
import {
  AuthenticationError,
  InvalidKeyError,
  KeyUnwrapError,
} from "./errors.js";
import { wipe, withKeyMaterial } from "./key-material.js";
import {
  NONCE_BYTES,
  SYMMETRIC_KEY_BYTES,
  TAG_BYTES,
  nodePrimitives,
} from "./primitives.js";
import type { CryptoPrimitives } from "./primitives.js";

export class EnvelopeCodec {
  private readonly primitives: CryptoPrimitives;

  constructor(primitives: CryptoPrimitives = nodePrimitives) {
    this.primitives = primitives;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Seal
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Encrypt `plaintext` for the holder of `recipientPublicKey`.
   *
   * @throws InvalidKeyError if the public key cannot be used for wrapping
   */
  encrypt(plaintext: Uint8Array, recipientPublicKey: Uint8Array): Envelope {
    return withKeyMaterial(this.primitives.randomBytes(SYMMETRIC_KEY_BYTES), (key) => {
      const nonce = this.primitives.randomBytes(NONCE_BYTES);
      const sealed = this.primitives.aeadEncrypt(key, nonce, plaintext);
      const encryptedKey = this.wrapKey(key, recipientPublicKey);
      const contentDigest = this.primitives.hash(plaintext);

      return Object.freeze({
        encryptedKey,
        ciphertext: sealed.ciphertext,
        nonce,
        authTag: sealed.tag,
        contentDigest,
      });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Open
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Recover the plaintext of `envelope` with the recipient's private key.
   *
   * @throws KeyUnwrapError if the symmetric key cannot be recovered
   * @throws AuthenticationError if the AEAD tag does not verify
   */
  decrypt(envelope: Envelope, privateKey: Uint8Array): Buffer {
    return withKeyMaterial(this.unwrapKey(envelope.encryptedKey, privateKey), (key) =>
      this.openPayload(key, envelope),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private wrapKey(key: Uint8Array, recipientPublicKey: Uint8Array): Buffer {
    try {
      return this.primitives.publicEncrypt(recipientPublicKey, key);
    } catch (err) {
      throw new InvalidKeyError(
        "Recipient public key cannot wrap the symmetric key",
        { cause: err },
      );
    }
  }

  private unwrapKey(encryptedKey: Uint8Array, privateKey: Uint8Array): Buffer {
    let key: Buffer;
    try {
      key = this.primitives.privateDecrypt(privateKey, encryptedKey);
    } catch (err) {
      throw new KeyUnwrapError(
        "Symmetric key could not be unwrapped (malformed key material or wrong recipient)",
        { cause: err },
      );
    }

    if (key.length !== SYMMETRIC_KEY_BYTES) {
      const length = key.length;
      wipe(key);
      throw new KeyUnwrapError(
        `Unwrapped key is ${length} bytes, expected ${SYMMETRIC_KEY_BYTES}`,
      );
    }

    return key;
  }

  private openPayload(key: Uint8Array, envelope: Envelope): Buffer {
    if (envelope.nonce.length !== NONCE_BYTES) {
      throw new AuthenticationError(
        `Nonce is ${envelope.nonce.length} bytes, expected ${NONCE_BYTES}`,
      );
    }
    if (envelope.authTag.length !== TAG_BYTES) {
      throw new AuthenticationError(
        `Auth tag is ${envelope.authTag.length} bytes, expected ${TAG_BYTES}`,
      );
    }

    try {
      return this.primitives.aeadDecrypt(
        key,
        envelope.nonce,
        envelope.ciphertext,
        envelope.authTag,
      );
    } catch (err) {
      throw new AuthenticationError(
        "Authentication tag mismatch (ciphertext, nonce or tag altered)",
        { cause: err },
      );
    }
  }
}
