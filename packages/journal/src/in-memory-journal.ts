/**
 * @mintline/journal — In-memory Journal implementation.
 *
 * Stores records in a plain array. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 *
 * No durability: all records are lost on process exit.
 */

import { GENESIS_HASH, sealRecord, verifyHashChain } from "./hash-chain.js";
import type {
  Clock,
  Journal,
  JournalIntegrityResult,
  JournalRecord,
} from "./types.js";
import { JournalError } from "./types.js";

export interface InMemoryJournalOptions {
  readonly clock?: Clock | undefined;
}

/**
 * Throws unless `payload` is a plain JSON object.
 */
export function assertPayload(payload: unknown): void {
  if (payload === null || typeof payload !== "object" || Array.isArray(payload)) {
    throw new JournalError(
      "INVALID_PAYLOAD",
      "Journal payload must be a JSON object",
    );
  }
}

export class InMemoryJournal<TPayload extends object> implements Journal<TPayload> {
  private readonly _records: JournalRecord<TPayload>[] = [];
  private readonly _clock: Clock;
  private _lastHash: string = GENESIS_HASH;

  constructor(options?: InMemoryJournalOptions) {
    this._clock = options?.clock ?? (() => new Date().toISOString());
  }

  append(payload: TPayload): JournalRecord<TPayload> {
    assertPayload(payload);

    const record = sealRecord(
      {
        position: this._records.length + 1,
        committedAt: this._clock(),
        payload,
      },
      this._lastHash,
    );

    this._records.push(record);
    this._lastHash = record.hash;
    return record;
  }

  read(fromPosition = 1): readonly JournalRecord<TPayload>[] {
    if (fromPosition < 1) {
      throw new JournalError(
        "INVALID_POSITION",
        `fromPosition must be >= 1, got ${fromPosition}`,
      );
    }
    return this._records.slice(fromPosition - 1);
  }

  get size(): number {
    return this._records.length;
  }

  verifyIntegrity(): JournalIntegrityResult {
    return verifyHashChain(this._records);
  }
}
