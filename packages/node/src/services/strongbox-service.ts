/**
 * StrongboxService — Composition root for the domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. The service owns one keypair for its lifetime:
 * uploads are sealed to its public key and downloads opened with its
 * private key.
 */

import { join } from "node:path";
import type { AccessRecord, Keypair } from "@strongbox/types";
import { KeypairManager, publicKeyToPem, wipeKeypair } from "@strongbox/crypto";
import {
  FileObjectStore,
  InMemoryObjectStore,
  encodeStoredObject,
} from "@strongbox/object-store";
import type { ObjectStore, StoredObjectDocument } from "@strongbox/object-store";
import { InMemoryAccessLedger, JsonlAccessLedger } from "@strongbox/access-ledger";
import type {
  AccessLedger,
  AccessQuery,
  LedgerFailure,
  LedgerIntegrityResult,
} from "@strongbox/access-ledger";
import { Vault } from "@strongbox/vault";
import type { DownloadOutcome, RemoveResult, UploadResult } from "@strongbox/vault";

// =============================================================================
// Configuration
// =============================================================================

export type StorageDriver = "memory" | "file";

export interface StrongboxServiceConfig {
  readonly storageDriver: StorageDriver;
  /** Root for `objects/` and `access.jsonl` under the file driver */
  readonly dataDir: string;
  readonly ledgerMaxAttempts?: number | undefined;
  /** Generated at construction when absent */
  readonly keypair?: Keypair | undefined;
  readonly onLedgerFailure?: ((failure: LedgerFailure) => void) | undefined;
  readonly clock?: (() => Date) | undefined;
}

export const KEY_ALGORITHM = "RSA-OAEP-3072-SHA256";

export interface PublicKeyInfo {
  readonly algorithm: typeof KEY_ALGORITHM;
  /** Hex SHA-256 of the SPKI DER */
  readonly fingerprint: string;
  readonly publicKeyPem: string;
}

// =============================================================================
// Service
// =============================================================================

export class StrongboxService {
  readonly vault: Vault;
  readonly store: ObjectStore;
  readonly ledger: AccessLedger;

  private readonly _keypair: Keypair;
  private readonly _publicKeyInfo: PublicKeyInfo;
  private _ready = false;

  constructor(config: StrongboxServiceConfig) {
    const now = config.clock;

    if (config.storageDriver === "file") {
      this.store = new FileObjectStore({ directory: join(config.dataDir, "objects"), now });
      this.ledger = new JsonlAccessLedger({
        filePath: join(config.dataDir, "access.jsonl"),
        now,
      });
    } else {
      this.store = new InMemoryObjectStore({ now });
      this.ledger = new InMemoryAccessLedger({ now });
    }

    const keys = new KeypairManager();
    this._keypair = config.keypair ?? keys.generateKeypair();
    this._publicKeyInfo = {
      algorithm: KEY_ALGORITHM,
      fingerprint: keys.fingerprint(this._keypair.publicKey),
      publicKeyPem: publicKeyToPem(this._keypair.publicKey),
    };

    this.vault = new Vault({
      store: this.store,
      ledger: this.ledger,
      clock: config.clock,
      onLedgerFailure: config.onLedgerFailure,
      ledgerMaxAttempts: config.ledgerMaxAttempts,
    });

    this._ready = true;
  }

  // ─── Keys ──────────────────────────────────────────────────────────

  publicKeyInfo(): PublicKeyInfo {
    return this._publicKeyInfo;
  }

  // ─── Objects ───────────────────────────────────────────────────────

  putObject(actorId: string, objectId: string, content: Uint8Array): UploadResult {
    return this.vault.upload({
      actorId,
      objectId,
      plaintext: content,
      recipientPublicKey: this._keypair.publicKey,
    });
  }

  /**
   * Download and verify. Not-found, decryption and integrity failures
   * come back as `ok: false`.
   */
  getObject(actorId: string, objectId: string): DownloadOutcome {
    return this.vault.tryDownload({
      actorId,
      objectId,
      privateKey: this._keypair.privateKey,
    });
  }

  /** The sealed form, as stored. Not an access, so not recorded. */
  getEnvelope(objectId: string): StoredObjectDocument {
    return encodeStoredObject(this.store.get(objectId));
  }

  deleteObject(actorId: string, objectId: string): RemoveResult {
    return this.vault.remove({ actorId, objectId });
  }

  listObjects(): readonly string[] {
    return this.store.list();
  }

  // ─── Access Ledger ─────────────────────────────────────────────────

  queryAccess(filter?: AccessQuery): readonly AccessRecord[] {
    return this.vault.ledger.query(filter);
  }

  verifyLedger(): LedgerIntegrityResult {
    return this.vault.ledger.verifyIntegrity();
  }

  /** Ledger appends given up on since start-up */
  get ledgerDroppedCount(): number {
    return this.vault.ledger.droppedCount;
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  isReady(): boolean {
    return this._ready;
  }

  /** Zeroes the private key. The service is unusable afterwards. */
  stop(): void {
    if (!this._ready) {
      return;
    }
    this._ready = false;
    wipeKeypair(this._keypair);
  }
}
