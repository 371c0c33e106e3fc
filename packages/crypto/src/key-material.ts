/**
 * Scoped handling for secret bytes.
 *
 * Symmetric keys and private keys are overwritten with zeros as soon
 * as the operation that needs them returns or throws.
 */

/**
 * Overwrite each buffer with zeros. Undefined entries are skipped.
 */
export function wipe(...buffers: readonly (Uint8Array | undefined)[]): void {
  for (const buffer of buffers) {
    buffer?.fill(0);
  }
}

/**
 * Run `use` with `material`, then zero `material` on every exit path.
 */
export function withKeyMaterial<T>(
  material: Uint8Array,
  use: (material: Uint8Array) => T,
): T {
  try {
    return use(material);
  } finally {
    wipe(material);
  }
}

/**
 * View the same memory as a Buffer, without copying.
 *
 * Node's key parsers take Buffers; a copy of a private key would
 * escape the wipe.
 */
export function asBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes)
    ? bytes
    : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}
