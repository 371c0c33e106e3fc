/**
 * @strongbox/object-store — In-memory ObjectStore implementation.
 *
 * Stores envelopes in a Map. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 *
 * Not durable: all state is lost on process exit.
 *
 * Bytes are copied on the way in and on the way out, so neither the
 * writer nor a reader can alter what is stored.
 */

import type { Envelope, StoredObject } from "@strongbox/types";
import type { ObjectStore } from "./types.js";
import { NotFoundError } from "./types.js";
import { assertObjectId, copyEnvelope } from "./validation.js";

export interface InMemoryObjectStoreOptions {
  /** Clock for `createdAt`. Default: wall clock */
  readonly now?: () => Date;
}

export class InMemoryObjectStore implements ObjectStore {
  private readonly _objects = new Map<string, StoredObject>();
  private readonly _now: () => Date;

  constructor(options: InMemoryObjectStoreOptions = {}) {
    this._now = options.now ?? (() => new Date());
  }

  // ─── Write ──────────────────────────────────────────────────────────

  store(objectId: string, envelope: Envelope): StoredObject {
    assertObjectId(objectId);

    const stored: StoredObject = Object.freeze({
      objectId,
      envelope: copyEnvelope(envelope),
      createdAt: this._now().toISOString(),
    });
    this._objects.set(objectId, stored);

    return this._copyOut(stored);
  }

  delete(objectId: string): void {
    assertObjectId(objectId);
    if (!this._objects.delete(objectId)) {
      throw new NotFoundError(objectId);
    }
  }

  // ─── Read ───────────────────────────────────────────────────────────

  retrieve(objectId: string): Envelope {
    return this.get(objectId).envelope;
  }

  get(objectId: string): StoredObject {
    assertObjectId(objectId);
    const stored = this._objects.get(objectId);
    if (stored === undefined) {
      throw new NotFoundError(objectId);
    }
    return this._copyOut(stored);
  }

  has(objectId: string): boolean {
    return this._objects.has(objectId);
  }

  list(): readonly string[] {
    return [...this._objects.keys()].sort();
  }

  get size(): number {
    return this._objects.size;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _copyOut(stored: StoredObject): StoredObject {
    return {
      objectId: stored.objectId,
      envelope: copyEnvelope(stored.envelope),
      createdAt: stored.createdAt,
    };
  }
}
