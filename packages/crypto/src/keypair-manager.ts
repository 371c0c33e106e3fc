/**
 * Keypair Manager — generates and exposes asymmetric keypairs.
 *
 * Keys are RSA-3072 (above the 2048-bit floor), DER-encoded so they
 * can be handed across a process boundary as plain bytes.
 */

import { createPublicKey } from "node:crypto";
import type { Keypair } from "@strongbox/types";
import { InvalidKeyError, KeyGenerationError } from "./errors.js";
import { asBuffer, wipe } from "./key-material.js";
import { nodePrimitives, RSA_MODULUS_BITS } from "./primitives.js";
import type { CryptoPrimitives, DerKeyPair } from "./primitives.js";

export class KeypairManager {
  private readonly primitives: CryptoPrimitives;

  constructor(primitives: CryptoPrimitives = nodePrimitives) {
    this.primitives = primitives;
  }

  /**
   * Generate a fresh keypair from the secure random source.
   *
   * @throws KeyGenerationError if the underlying primitive fails
   */
  generateKeypair(): Keypair {
    let generated: DerKeyPair;
    try {
      generated = this.primitives.generateKeyPair(RSA_MODULUS_BITS);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new KeyGenerationError(`Keypair generation failed: ${reason}`, {
        cause: err,
      });
    }

    return Object.freeze({
      publicKey: generated.publicKey,
      privateKey: generated.privateKey,
    });
  }

  /**
   * Hex SHA-256 of the public key bytes, for display and lookup.
   */
  fingerprint(publicKey: Uint8Array): string {
    return this.primitives.hash(publicKey).toString("hex");
  }
}

/**
 * Zero the private key. Call at holder teardown.
 */
export function wipeKeypair(keypair: Keypair): void {
  wipe(keypair.privateKey);
}

/**
 * Export a DER public key as PEM ("-----BEGIN PUBLIC KEY-----").
 *
 * @throws InvalidKeyError if the bytes are not an SPKI public key
 */
export function publicKeyToPem(publicKey: Uint8Array): string {
  let pem: string | Buffer;
  try {
    pem = createPublicKey({ key: asBuffer(publicKey), format: "der", type: "spki" })
      .export({ type: "spki", format: "pem" });
  } catch (err) {
    throw new InvalidKeyError("Public key is not a DER SubjectPublicKeyInfo", {
      cause: err,
    });
  }
  return typeof pem === "string" ? pem : pem.toString("utf-8");
}

/**
 * Parse a PEM public key back into DER bytes.
 *
 * @throws InvalidKeyError if the text is not a PEM public key
 */
export function publicKeyFromPem(pem: string): Buffer {
  try {
    return createPublicKey({ key: pem, format: "pem" }).export({
      type: "spki",
      format: "der",
    });
  } catch (err) {
    throw new InvalidKeyError("Text is not a PEM public key", { cause: err });
  }
}
