/**
 * @strongbox/object-store — Core types.
 *
 * Keyed storage for sealed envelopes.
 *
 * Design principles:
 * - The store only ever sees ciphertext; it holds no key material
 * - A write replaces any previous object under the same id (last write wins)
 * - Every operation is a synchronous unit of work, so operations on one
 *   id never interleave
 * - Stored bytes are never shared with callers
 */

import type { Envelope, StoredObject } from "@strongbox/types";

// =============================================================================
// Object Store Interface
// =============================================================================

export interface ObjectStore {
  /**
   * Insert or overwrite the object under `objectId`.
   *
   * @returns The stored object, stamped with the write time
   * @throws ObjectStoreError (INVALID_OBJECT_ID) for a malformed id
   */
  store(objectId: string, envelope: Envelope): StoredObject;

  /**
   * Fetch the envelope stored under `objectId`.
   *
   * @throws NotFoundError if nothing is stored under the id
   */
  retrieve(objectId: string): Envelope;

  /**
   * Remove the object stored under `objectId`.
   *
   * @throws NotFoundError if nothing is stored under the id
   */
  delete(objectId: string): void;

  /**
   * Fetch the stored object (envelope and write time).
   *
   * @throws NotFoundError if nothing is stored under the id
   */
  get(objectId: string): StoredObject;

  has(objectId: string): boolean;

  /** Stored ids in ascending order. */
  list(): readonly string[];

  /** Number of stored objects. */
  readonly size: number;
}

// =============================================================================
// Errors
// =============================================================================

export type ObjectStoreErrorCode =
  | "NOT_FOUND"
  | "INVALID_OBJECT_ID"
  | "CORRUPT_RECORD";

/**
 * Error thrown by ObjectStore operations.
 */
export class ObjectStoreError extends Error {
  constructor(
    public readonly code: ObjectStoreErrorCode,
    message: string,
    public readonly objectId?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ObjectStoreError";
  }
}

/**
 * No object is stored under the requested id.
 */
export class NotFoundError extends ObjectStoreError {
  constructor(objectId: string) {
    super("NOT_FOUND", `Object "${objectId}" not found`, objectId);
    this.name = "NotFoundError";
  }
}
