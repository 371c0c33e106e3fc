/**
 * @strongbox/access-ledger — In-memory AccessLedger implementation.
 *
 * Stores records in a plain array. Suitable for tests and
 * short-lived processes; nothing survives process exit.
 */

import type { AccessAction, AccessRecord } from "@strongbox/types";
import type {
  AccessLedger,
  AccessQuery,
  LedgerIntegrityResult,
  RecordOptions,
} from "./types.js";
import { verifyLedgerChain } from "./hash-chain.js";
import { createAccessRecord, filterRecords } from "./records.js";

export interface InMemoryAccessLedgerOptions {
  /** Clock for record timestamps. Default: wall clock */
  readonly now?: () => Date;
}

export class InMemoryAccessLedger implements AccessLedger {
  private readonly _records: AccessRecord[] = [];
  private readonly _now: () => Date;

  constructor(options: InMemoryAccessLedgerOptions = {}) {
    this._now = options.now ?? (() => new Date());
  }

  record(
    actorId: string,
    objectId: string,
    action: AccessAction,
    options?: RecordOptions,
  ): AccessRecord {
    const record = createAccessRecord(
      this._records.at(-1),
      actorId,
      objectId,
      action,
      options,
      this._now().toISOString(),
    );
    this._records.push(record);
    return record;
  }

  query(filter?: AccessQuery): readonly AccessRecord[] {
    return filterRecords(this._records, filter);
  }

  get size(): number {
    return this._records.length;
  }

  verifyIntegrity(): LedgerIntegrityResult {
    return verifyLedgerChain(this._records);
  }
}
