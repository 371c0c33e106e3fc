/**
 * @strongbox/crypto — Hybrid envelope encryption.
 *
 * Provides:
 * - CryptoPrimitives binding over node:crypto
 * - KeypairManager for RSA-3072 keypairs
 * - EnvelopeCodec for AES-256-GCM + RSA-OAEP envelopes
 * - IntegrityVerifier for constant-time digest checks
 * - Typed error taxonomy
 *
 * @packageDocumentation
 */

// Primitives
export {
  nodePrimitives,
  AEAD_ALGORITHM,
  SYMMETRIC_KEY_BYTES,
  NONCE_BYTES,
  TAG_BYTES,
  RSA_MODULUS_BITS,
  RSA_PUBLIC_EXPONENT,
  OAEP_HASH,
  DIGEST_ALGORITHM,
  DIGEST_BYTES,
} from "./primitives.js";
export type { CryptoPrimitives, AeadSealed, DerKeyPair } from "./primitives.js";

// Key material
export { wipe, withKeyMaterial, asBuffer } from "./key-material.js";

// Components
export {
  KeypairManager,
  wipeKeypair,
  publicKeyToPem,
  publicKeyFromPem,
} from "./keypair-manager.js";
export { EnvelopeCodec } from "./envelope-codec.js";
export { IntegrityVerifier } from "./integrity.js";

// Errors
export type { CryptoErrorCode } from "./errors.js";
export {
  CryptoError,
  KeyGenerationError,
  InvalidKeyError,
  KeyUnwrapError,
  AuthenticationError,
} from "./errors.js";
