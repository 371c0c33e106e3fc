/**
 * @strongbox/access-ledger — Failure-isolating ledger wrapper.
 *
 * Recording an access must never abort the operation being recorded.
 * This wrapper retries a failed append, then drops it and reports the
 * drop through `onFailure`. `record` never throws on a failed append.
 */

import type { AccessAction, AccessRecord } from "@strongbox/types";
import type {
  AccessLedger,
  AccessQuery,
  LedgerIntegrityResult,
  RecordOptions,
} from "./types.js";

export const DEFAULT_MAX_ATTEMPTS = 2;

/**
 * A dropped append, as reported to `onFailure`.
 */
export interface LedgerFailure {
  readonly actorId: string;
  readonly objectId: string;
  readonly action: AccessAction;
  readonly outcome?: RecordOptions["outcome"];
  readonly attempts: number;
  readonly error: unknown;
}

export interface ResilientAccessLedgerOptions {
  /** Total append attempts before a record is dropped. Default: 2 */
  readonly maxAttempts?: number | undefined;

  /** Called once per dropped record. Must not throw. */
  readonly onFailure?: ((failure: LedgerFailure) => void) | undefined;
}

export class ResilientAccessLedger {
  private readonly _inner: AccessLedger;
  private readonly _maxAttempts: number;
  private readonly _onFailure: ((failure: LedgerFailure) => void) | undefined;
  private _droppedCount = 0;

  constructor(inner: AccessLedger, options: ResilientAccessLedgerOptions = {}) {
    const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be an integer >= 1, got ${maxAttempts}`);
    }

    this._inner = inner;
    this._maxAttempts = maxAttempts;
    this._onFailure = options.onFailure;
  }

  /**
   * Append a record, retrying on failure.
   *
   * @returns The appended record, or undefined if it was dropped
   */
  record(
    actorId: string,
    objectId: string,
    action: AccessAction,
    options?: RecordOptions,
  ): AccessRecord | undefined {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this._maxAttempts; attempt++) {
      try {
        return this._inner.record(actorId, objectId, action, options);
      } catch (err) {
        lastError = err;
      }
    }

    this._droppedCount++;
    this._onFailure?.({
      actorId,
      objectId,
      action,
      outcome: options?.outcome,
      attempts: this._maxAttempts,
      error: lastError,
    });
    return undefined;
  }

  query(filter?: AccessQuery): readonly AccessRecord[] {
    return this._inner.query(filter);
  }

  get size(): number {
    return this._inner.size;
  }

  verifyIntegrity(): LedgerIntegrityResult {
    return this._inner.verifyIntegrity();
  }

  /** Records dropped since construction */
  get droppedCount(): number {
    return this._droppedCount;
  }

  /** The wrapped ledger */
  get inner(): AccessLedger {
    return this._inner;
  }
}
