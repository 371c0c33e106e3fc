/**
 * Key Types
 *
 * Asymmetric key material in an exchange-ready encoding.
 *
 * Rules:
 * - Keys are opaque byte sequences (DER)
 * - The private key never leaves its holder's trust boundary
 * - A keypair is immutable; the holder wipes it at teardown
 */

/**
 * An asymmetric keypair.
 */
export interface Keypair {
  /** SubjectPublicKeyInfo (SPKI), DER-encoded. Shareable. */
  readonly publicKey: Uint8Array;

  /** PKCS#8 private key, DER-encoded. Held, never shared. */
  readonly privateKey: Uint8Array;
}
