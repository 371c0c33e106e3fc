/**
 * @strongbox/object-store — File-based ObjectStore implementation.
 *
 * Stores each object as one JSON document:
 *   <directory>/<hex sha256(objectId)>.json
 *
 * Hashing keeps every file name at 64 characters whatever the id holds.
 * The id itself is read back from the document.
 *
 * Crash safety:
 * - Each write goes to a temp file, is fsynced, then renamed over the
 *   target, so a reader sees the old object or the new one, never a mix
 * - Leftover temp files from an interrupted write are ignored
 *
 * Documents are written with mode 0600.
 */

import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  readdirSync,
  renameSync,
  unlinkSync,
  writeSync,
} from "node:fs";
import { createHash, randomBytes } from "node:crypto";
import { join } from "node:path";
import { isObjectId } from "@strongbox/types";
import type { Envelope, StoredObject } from "@strongbox/types";
import type { ObjectStore } from "./types.js";
import { NotFoundError, ObjectStoreError } from "./types.js";
import { deserializeStoredObject, serializeStoredObject } from "./codec.js";
import { assertObjectId, copyEnvelope } from "./validation.js";

export interface FileObjectStoreOptions {
  /** Directory holding one document per object */
  readonly directory: string;

  /** Clock for `createdAt`. Default: wall clock */
  readonly now?: () => Date;
}

const DOCUMENT_SUFFIX = ".json";
const FILE_MODE = 0o600;

export class FileObjectStore implements ObjectStore {
  private readonly _directory: string;
  private readonly _now: () => Date;

  /**
   * The directory is created if it doesn't exist.
   */
  constructor(options: FileObjectStoreOptions) {
    this._directory = options.directory;
    this._now = options.now ?? (() => new Date());
    mkdirSync(this._directory, { recursive: true });
  }

  // ─── Write ──────────────────────────────────────────────────────────

  store(objectId: string, envelope: Envelope): StoredObject {
    assertObjectId(objectId);

    const stored: StoredObject = {
      objectId,
      envelope: copyEnvelope(envelope),
      createdAt: this._now().toISOString(),
    };

    this._writeAtomically(this._documentPath(objectId), serializeStoredObject(stored));
    return stored;
  }

  delete(objectId: string): void {
    assertObjectId(objectId);
    const path = this._documentPath(objectId);
    try {
      unlinkSync(path);
    } catch (err) {
      if (isMissingFile(err)) {
        throw new NotFoundError(objectId);
      }
      throw err;
    }
  }

  // ─── Read ───────────────────────────────────────────────────────────

  retrieve(objectId: string): Envelope {
    return this.get(objectId).envelope;
  }

  get(objectId: string): StoredObject {
    assertObjectId(objectId);

    let text: string;
    try {
      text = readFileSync(this._documentPath(objectId), "utf-8");
    } catch (err) {
      if (isMissingFile(err)) {
        throw new NotFoundError(objectId);
      }
      throw err;
    }

    const stored = deserializeStoredObject(text);
    if (stored.objectId !== objectId) {
      throw new ObjectStoreError(
        "CORRUPT_RECORD",
        `Document for "${objectId}" holds object "${stored.objectId}"`,
        objectId,
      );
    }
    return stored;
  }

  has(objectId: string): boolean {
    return isObjectId(objectId) && existsSync(this._documentPath(objectId));
  }

  list(): readonly string[] {
    const ids: string[] = [];
    for (const file of readdirSync(this._directory)) {
      if (!file.endsWith(DOCUMENT_SUFFIX)) {
        continue;
      }
      const text = readFileSync(join(this._directory, file), "utf-8");
      ids.push(deserializeStoredObject(text).objectId);
    }
    return ids.sort();
  }

  get size(): number {
    return this.list().length;
  }

  /** Directory this store writes to */
  get directory(): string {
    return this._directory;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _documentPath(objectId: string): string {
    return join(this._directory, `${documentName(objectId)}${DOCUMENT_SUFFIX}`);
  }

  /**
   * Write to a temp file, fsync, then rename over the target.
   */
  private _writeAtomically(path: string, data: string): void {
    const tempPath = `${path}.${randomBytes(4).toString("hex")}.tmp`;
    try {
      const fd = openSync(tempPath, "w", FILE_MODE);
      try {
        writeSync(fd, data, null, "utf-8");
        fsyncSync(fd);
      } finally {
        closeSync(fd);
      }
      renameSync(tempPath, path);
    } catch (err) {
      if (existsSync(tempPath)) {
        unlinkSync(tempPath);
      }
      throw err;
    }
  }
}

function documentName(objectId: string): string {
  return createHash("sha256").update(objectId, "utf-8").digest("hex");
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
