/**
 * Vault — hybrid-encrypted object storage coordinator.
 *
 * Composes:
 * - EnvelopeCodec (seal / open)
 * - IntegrityVerifier (content digest check)
 * - ObjectStore (envelope persistence)
 * - AccessLedger (who did what, wrapped so it can never fail an operation)
 *
 * Every upload and download walks the OperationLifecycle state machine
 * and returns its trace. Nothing is ambient: all collaborators are
 * passed in.
 */

import { readFileSync } from "node:fs";
import type { AccessOutcome, AccessRecord, Envelope } from "@strongbox/types";
import {
  AuthenticationError,
  EnvelopeCodec,
  IntegrityVerifier,
  KeyUnwrapError,
  wipe,
} from "@strongbox/crypto";
import { NotFoundError } from "@strongbox/object-store";
import type { ObjectStore } from "@strongbox/object-store";
import { MAX_ACTOR_ID_LENGTH, ResilientAccessLedger } from "@strongbox/access-ledger";
import type { AccessLedger, LedgerFailure } from "@strongbox/access-ledger";
import { InputUnavailableError, IntegrityError, VaultError } from "./errors.js";
import { OperationLifecycle } from "./lifecycle.js";
import type {
  DownloadFailure,
  DownloadOutcome,
  DownloadRequest,
  DownloadResult,
  RemoveRequest,
  RemoveResult,
  UploadFileRequest,
  UploadRequest,
  UploadResult,
} from "./types.js";

export interface VaultOptions {
  readonly store: ObjectStore;
  readonly ledger: AccessLedger;
  readonly codec?: EnvelopeCodec;
  readonly verifier?: IntegrityVerifier;
  /** Clock for lifecycle traces. Default: wall clock */
  readonly clock?: () => Date;
  /** Called when a ledger append is dropped after all attempts */
  readonly onLedgerFailure?: (failure: LedgerFailure) => void;
  /** Ledger append attempts before a record is dropped. Default: 2 */
  readonly ledgerMaxAttempts?: number;
}

// =============================================================================
// Vault
// =============================================================================

export class Vault {
  readonly store: ObjectStore;
  readonly ledger: ResilientAccessLedger;
  private readonly codec: EnvelopeCodec;
  private readonly verifier: IntegrityVerifier;
  private readonly clock: () => Date;

  constructor(options: VaultOptions) {
    this.store = options.store;
    this.ledger = new ResilientAccessLedger(options.ledger, {
      maxAttempts: options.ledgerMaxAttempts,
      onFailure: options.onLedgerFailure,
    });
    this.codec = options.codec ?? new EnvelopeCodec();
    this.verifier = options.verifier ?? new IntegrityVerifier();
    this.clock = options.clock ?? (() => new Date());
  }

  // ───────────────────────────────────────────────────────────────────────
  // Upload
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Encrypt `plaintext` for the recipient, store it, record the upload.
   *
   * @throws InvalidKeyError if the recipient public key is unusable
   * @throws ObjectStoreError if the object id is invalid
   */
  upload(request: UploadRequest): UploadResult {
    this.requireActor(request.actorId);
    const lifecycle = new OperationLifecycle("created", this.clock);

    try {
      const envelope = this.codec.encrypt(request.plaintext, request.recipientPublicKey);
      lifecycle.transition("encrypted");

      const stored = this.store.store(request.objectId, envelope);
      lifecycle.transition("stored");

      const record = this.ledger.record(request.actorId, request.objectId, "upload");

      return {
        objectId: request.objectId,
        stored,
        record,
        trace: lifecycle.trace,
      };
    } catch (err) {
      lifecycle.fail();
      throw err;
    }
  }

  /**
   * Read `filePath` and upload its contents.
   *
   * @throws InputUnavailableError if the file cannot be read; nothing is
   *   encrypted, stored or recorded in that case
   */
  uploadFile(request: UploadFileRequest): UploadResult {
    this.requireActor(request.actorId);

    let plaintext: Buffer;
    try {
      plaintext = readFileSync(request.filePath);
    } catch (err) {
      throw new InputUnavailableError(request.filePath, { cause: err });
    }

    try {
      return this.upload({
        actorId: request.actorId,
        objectId: request.objectId,
        plaintext,
        recipientPublicKey: request.recipientPublicKey,
      });
    } finally {
      wipe(plaintext);
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Download
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Retrieve, decrypt and verify an object.
   *
   * @throws NotFoundError if nothing is stored under the id
   * @throws KeyUnwrapError if the private key does not unwrap the envelope
   * @throws AuthenticationError if the envelope was altered
   * @throws IntegrityError if the plaintext does not match its digest
   */
  download(request: DownloadRequest): DownloadResult {
    const outcome = this.tryDownload(request);
    if (!outcome.ok) {
      throw outcome.error;
    }
    return {
      objectId: outcome.objectId,
      plaintext: outcome.plaintext,
      record: outcome.record,
      trace: outcome.trace,
    };
  }

  /**
   * Same flow as `download`, but the expected failures come back as a
   * result instead of being thrown. Anything else still throws.
   */
  tryDownload(request: DownloadRequest): DownloadOutcome {
    this.requireActor(request.actorId);
    const { actorId, objectId } = request;
    const lifecycle = new OperationLifecycle("stored", this.clock);

    const failure = (
      error: DownloadFailure,
      record: AccessRecord | undefined,
    ): DownloadOutcome => ({
      ok: false,
      objectId,
      failedAt: lifecycle.fail(),
      error,
      record,
      trace: lifecycle.trace,
    });

    // ─── Retrieve ───
    let envelope: Envelope;
    try {
      envelope = this.store.retrieve(objectId);
    } catch (err) {
      if (err instanceof NotFoundError) {
        // Nothing was reached, so nothing is recorded.
        return failure(err, undefined);
      }
      lifecycle.fail();
      throw err;
    }
    lifecycle.transition("retrieved");

    // ─── Decrypt ───
    let plaintext: Buffer;
    try {
      plaintext = this.codec.decrypt(envelope, request.privateKey);
    } catch (err) {
      if (err instanceof KeyUnwrapError || err instanceof AuthenticationError) {
        return failure(err, this.recordDownload(actorId, objectId, "decrypt_failed"));
      }
      this.recordDownload(actorId, objectId, "decrypt_failed");
      lifecycle.fail();
      throw err;
    }
    lifecycle.transition("decrypted");

    // ─── Verify ───
    if (!this.verifier.verify(envelope.contentDigest, plaintext)) {
      wipe(plaintext);
      lifecycle.transition("verification_failed");
      return {
        ok: false,
        objectId,
        failedAt: "decrypted",
        error: new IntegrityError(objectId),
        record: this.recordDownload(actorId, objectId, "integrity_failed"),
        trace: lifecycle.trace,
      };
    }
    lifecycle.transition("verified");

    return {
      ok: true,
      objectId,
      plaintext,
      record: this.recordDownload(actorId, objectId, "ok"),
      trace: lifecycle.trace,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Remove
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Delete an object and record the deletion.
   *
   * @throws NotFoundError if nothing is stored under the id
   */
  remove(request: RemoveRequest): RemoveResult {
    this.requireActor(request.actorId);
    this.store.delete(request.objectId);
    return {
      objectId: request.objectId,
      record: this.ledger.record(request.actorId, request.objectId, "delete"),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private recordDownload(
    actorId: string,
    objectId: string,
    outcome: AccessOutcome,
  ): AccessRecord | undefined {
    return this.ledger.record(actorId, objectId, "download", { outcome });
  }

  private requireActor(actorId: string): void {
    if (actorId.length === 0 || actorId.length > MAX_ACTOR_ID_LENGTH) {
      throw new VaultError(
        "INVALID_REQUEST",
        `actorId must be 1-${MAX_ACTOR_ID_LENGTH} characters`,
      );
    }
  }
}
