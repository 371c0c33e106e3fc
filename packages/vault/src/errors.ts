/**
 * @strongbox/vault — Orchestration errors.
 */

export type VaultErrorCode =
  | "INVALID_TRANSITION"
  | "INVALID_REQUEST"
  | "INPUT_UNAVAILABLE"
  | "INTEGRITY_FAILED";

export class VaultError extends Error {
  public readonly code: VaultErrorCode;

  constructor(code: VaultErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "VaultError";
    this.code = code;
  }
}

/**
 * The upload source could not be read. Raised before any encryption.
 */
export class InputUnavailableError extends VaultError {
  public readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    super("INPUT_UNAVAILABLE", `Input "${path}" cannot be read`, options);
    this.name = "InputUnavailableError";
    this.path = path;
  }
}

/**
 * Decryption authenticated, but the plaintext does not match the
 * digest recorded at upload.
 */
export class IntegrityError extends VaultError {
  public readonly objectId: string;

  constructor(objectId: string) {
    super(
      "INTEGRITY_FAILED",
      `Content digest mismatch for object "${objectId}"`,
    );
    this.name = "IntegrityError";
    this.objectId = objectId;
  }
}
