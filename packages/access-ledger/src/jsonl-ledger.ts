/**
 * @strongbox/access-ledger — File-based JSONL AccessLedger implementation.
 *
 * Stores records as one JSON object per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each record is written with a single append + fsync before returning
 * - A torn trailing line (no final newline) is cut off on load, so the
 *   next append starts on a fresh line
 * - The file is the source of truth; in-memory state is derived
 *
 * File format:
 * {"sequence":1,"actorId":"alice","objectId":"obj1","action":"upload","timestamp":"...","hash":"...","previousHash":"genesis"}
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  truncateSync,
} from "node:fs";
import { dirname } from "node:path";
import { isAccessRecord } from "@strongbox/types";
import type { AccessAction, AccessRecord } from "@strongbox/types";
import type {
  AccessLedger,
  AccessQuery,
  LedgerIntegrityResult,
  RecordOptions,
} from "./types.js";
import { verifyLedgerChain } from "./hash-chain.js";
import { createAccessRecord, filterRecords } from "./records.js";

export interface JsonlAccessLedgerOptions {
  /** Path to the JSONL file */
  readonly filePath: string;

  /** Clock for record timestamps. Default: wall clock */
  readonly now?: () => Date;
}

const NEWLINE = 0x0a;

export class JsonlAccessLedger implements AccessLedger {
  private readonly _filePath: string;
  private readonly _now: () => Date;
  private readonly _records: AccessRecord[] = [];
  private _skippedLines = 0;

  /**
   * If the file exists, records are loaded from it; otherwise it is
   * created on first append. The parent directory is created if missing.
   */
  constructor(options: JsonlAccessLedgerOptions) {
    this._filePath = options.filePath;
    this._now = options.now ?? (() => new Date());

    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  // ─── Append ─────────────────────────────────────────────────────────

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

    this._writeAndSync(JSON.stringify(record) + "\n");

    // In-memory state only after a successful write
    this._records.push(record);
    return record;
  }

  // ─── Read ───────────────────────────────────────────────────────────

  query(filter?: AccessQuery): readonly AccessRecord[] {
    return filterRecords(this._records, filter);
  }

  get size(): number {
    return this._records.length;
  }

  verifyIntegrity(): LedgerIntegrityResult {
    return verifyLedgerChain(this._records);
  }

  /** Lines dropped on load because they did not parse as records */
  get skippedLines(): number {
    return this._skippedLines;
  }

  get filePath(): string {
    return this._filePath;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Load records from the JSONL file into memory.
   *
   * Tolerates partial/corrupt lines (unclean shutdown). Skipped lines
   * leave a gap that verifyIntegrity reports. Bytes after the last
   * newline never made it into a record and are truncated away.
   */
  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const raw = readFileSync(this._filePath);
    const complete = raw.lastIndexOf(NEWLINE) + 1;
    if (complete < raw.length) {
      if (raw.subarray(complete).toString("utf-8").trim().length > 0) {
        this._skippedLines++;
      }
      truncateSync(this._filePath, complete);
    }

    const content = raw.subarray(0, complete).toString("utf-8");

    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        // Corrupt/partial line
        this._skippedLines++;
        continue;
      }

      if (!isAccessRecord(parsed)) {
        this._skippedLines++;
        continue;
      }

      this._records.push(Object.freeze(parsed));
    }
  }

  /**
   * Write data to the JSONL file and fsync for durability.
   */
  private _writeAndSync(data: string): void {
    const fd = openSync(this._filePath, "a", 0o600);
    try {
      appendFileSync(fd, data, "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }
}
