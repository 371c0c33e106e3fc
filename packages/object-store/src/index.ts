/**
 * @strongbox/object-store — Keyed storage for sealed envelopes.
 *
 * Provides:
 * - ObjectStore interface
 * - InMemoryObjectStore for tests and development
 * - FileObjectStore for durable, atomically replaced documents
 * - Stored object serialization
 *
 * @packageDocumentation
 */

// Core types
export type { ObjectStore, ObjectStoreErrorCode } from "./types.js";
export { ObjectStoreError, NotFoundError } from "./types.js";

// Implementations
export { InMemoryObjectStore } from "./in-memory-store.js";
export type { InMemoryObjectStoreOptions } from "./in-memory-store.js";
export { FileObjectStore } from "./file-store.js";
export type { FileObjectStoreOptions } from "./file-store.js";

// Serialization
export {
  encodeStoredObject,
  serializeStoredObject,
  deserializeStoredObject,
  STORED_OBJECT_VERSION,
} from "./codec.js";
export type { StoredObjectDocument } from "./codec.js";
