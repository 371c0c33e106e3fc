/**
 * @strongbox/crypto — Error taxonomy.
 *
 * Every failure carries a stable `code` so callers can tell
 * "could not unwrap" from "could not authenticate" without
 * parsing messages. The underlying primitive error, when there
 * is one, is kept as `cause`.
 */

export type CryptoErrorCode =
  | "KEY_GENERATION_FAILED"
  | "INVALID_KEY"
  | "KEY_UNWRAP_FAILED"
  | "AUTHENTICATION_FAILED";

export class CryptoError extends Error {
  public readonly code: CryptoErrorCode;

  constructor(code: CryptoErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CryptoError";
    this.code = code;
  }
}

/**
 * The keypair primitive failed (entropy source, parameters).
 */
export class KeyGenerationError extends CryptoError {
  constructor(message: string, options?: ErrorOptions) {
    super("KEY_GENERATION_FAILED", message, options);
    this.name = "KeyGenerationError";
  }
}

/**
 * A recipient public key could not be parsed.
 */
export class InvalidKeyError extends CryptoError {
  constructor(message: string, options?: ErrorOptions) {
    super("INVALID_KEY", message, options);
    this.name = "InvalidKeyError";
  }
}

/**
 * The wrapped symmetric key could not be recovered: malformed
 * ciphertext, malformed private key, or a key that does not
 * belong to the original recipient.
 */
export class KeyUnwrapError extends CryptoError {
  constructor(message: string, options?: ErrorOptions) {
    super("KEY_UNWRAP_FAILED", message, options);
    this.name = "KeyUnwrapError";
  }
}

/**
 * The AEAD tag did not verify. No plaintext is returned.
 */
export class AuthenticationError extends CryptoError {
  constructor(message: string, options?: ErrorOptions) {
    super("AUTHENTICATION_FAILED", message, options);
    this.name = "AuthenticationError";
  }
}
