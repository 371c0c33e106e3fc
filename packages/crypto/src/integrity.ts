/**
 * Integrity Verifier — the second, explicit integrity channel.
 *
 * Recomputes the content digest of decrypted data and compares it to
 * the digest recorded at seal time. Comparison is constant-time.
 */

import { timingSafeEqual } from "node:crypto";
import { nodePrimitives } from "./primitives.js";
import type { CryptoPrimitives } from "./primitives.js";

export class IntegrityVerifier {
  private readonly primitives: CryptoPrimitives;

  constructor(primitives: CryptoPrimitives = nodePrimitives) {
    this.primitives = primitives;
  }

  computeDigest(data: Uint8Array): Buffer {
    return this.primitives.hash(data);
  }

  /**
   * True iff hash(data) equals `expectedDigest`.
   */
  verify(expectedDigest: Uint8Array, data: Uint8Array): boolean {
    const actual = this.computeDigest(data);
    // Digest length is public; only content comparison needs to be constant-time.
    if (actual.length !== expectedDigest.length) {
      return false;
    }
    return timingSafeEqual(actual, expectedDigest);
  }
}
