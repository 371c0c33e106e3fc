/**
 * @strongbox/access-ledger — Append-only, hash-chained access records.
 *
 * Provides:
 * - AccessLedger interface
 * - InMemoryAccessLedger for tests and development
 * - JsonlAccessLedger for durable file-based persistence
 * - ResilientAccessLedger, which retries and then drops failed appends
 * - Hash chain computation and verification
 *
 * @packageDocumentation
 */

// Core types
export type {
  AccessLedger,
  AccessQuery,
  RecordOptions,
  LedgerChainBreak,
  LedgerIntegrityResult,
  AccessLedgerErrorCode,
} from "./types.js";
export { AccessLedgerError } from "./types.js";

// Hash chain
export {
  GENESIS_HASH,
  computeRecordHash,
  verifyLedgerChain,
} from "./hash-chain.js";
export type { AccessRecordBody } from "./hash-chain.js";

// Records
export { MAX_ACTOR_ID_LENGTH } from "./records.js";

// Implementations
export { InMemoryAccessLedger } from "./in-memory-ledger.js";
export type { InMemoryAccessLedgerOptions } from "./in-memory-ledger.js";
export { JsonlAccessLedger } from "./jsonl-ledger.js";
export type { JsonlAccessLedgerOptions } from "./jsonl-ledger.js";
export {
  ResilientAccessLedger,
  DEFAULT_MAX_ATTEMPTS,
} from "./resilient-ledger.js";
export type {
  LedgerFailure,
  ResilientAccessLedgerOptions,
} from "./resilient-ledger.js";
