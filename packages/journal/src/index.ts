/**
 * @mintline/journal — Append-only, hash-chained write-ahead journal.
 *
 * Provides:
 * - Journal interface for append-only payload logs
 * - InMemoryJournal for tests and development
 * - JsonlJournal for durable file-based persistence
 * - Hash-chain helpers for tamper detection
 *
 * @packageDocumentation
 */

// Core types
export type {
  Clock,
  Journal,
  JournalRecord,
  JournalRecordContent,
  JournalErrorCode,
  IntegrityError,
  JournalIntegrityResult,
} from "./types.js";
export { JournalError } from "./types.js";

// Hash chain
export {
  computeRecordHash,
  sealRecord,
  verifyHashChain,
  GENESIS_HASH,
} from "./hash-chain.js";

// Implementations
export { InMemoryJournal } from "./in-memory-journal.js";
export type { InMemoryJournalOptions } from "./in-memory-journal.js";
export { JsonlJournal } from "./jsonl-journal.js";
export type { JsonlJournalOptions } from "./jsonl-journal.js";
