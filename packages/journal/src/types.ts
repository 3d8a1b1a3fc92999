/**
 * @mintline/journal — Core types.
 *
 * A journal is an append-only, hash-chained sequence of committed
 * payloads. Consumers write a payload BEFORE applying the change it
 * describes and rebuild their state by replaying the journal on startup.
 *
 * Invariants:
 * - Records are immutable once appended
 * - Positions are contiguous (1, 2, 3, ...) with no gaps
 * - Every record links to its predecessor's hash
 */

// =============================================================================
// Records
// =============================================================================

/**
 * A payload as persisted in the journal.
 */
export interface JournalRecord<TPayload> {
  /** Position in the journal (1-based, monotonically increasing) */
  readonly position: number;

  /** When the record was committed (store-level, not domain-level) */
  readonly committedAt: string;

  /** The committed payload */
  readonly payload: TPayload;

  /** Hash of the preceding record, or GENESIS_HASH for position 1 */
  readonly previousHash: string;

  /** SHA-256 over the canonical record content + previousHash */
  readonly hash: string;
}

/**
 * The hashed content of a record (everything except the chain links).
 */
export type JournalRecordContent<TPayload> = Pick<
  JournalRecord<TPayload>,
  "position" | "committedAt" | "payload"
>;

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface JournalIntegrityResult {
  readonly valid: boolean;
  /** Position of the last record that verified cleanly (0 if none) */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Journal Interface
// =============================================================================

/**
 * Append-only journal of JSON-serializable payloads.
 */
export interface Journal<TPayload> {
  /**
   * Append one payload. The record is durable when this returns.
   *
   * @throws JournalError if the payload is not a JSON object or the write fails
   */
  append(payload: TPayload): JournalRecord<TPayload>;

  /**
   * Read records in position order.
   *
   * @param fromPosition - First position to return (inclusive). Default: 1
   */
  read(fromPosition?: number): readonly JournalRecord<TPayload>[];

  /** Number of records in the journal */
  readonly size: number;

  /** Recompute and verify the hash chain */
  verifyIntegrity(): JournalIntegrityResult;
}

/**
 * Supplies commit timestamps. Injected so tests are deterministic.
 */
export type Clock = () => string;

// =============================================================================
// Errors
// =============================================================================

export type JournalErrorCode =
  | "INVALID_PAYLOAD"
  | "INVALID_POSITION"
  | "WRITE_FAILED";

/**
 * Error thrown by Journal operations.
 */
export class JournalError extends Error {
  constructor(
    public readonly code: JournalErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "JournalError";
  }
}
