/**
 * @mintline/ledger — Append-only transfer log.
 *
 * Every completed mint, transfer and burn becomes one frozen record.
 * Sequence numbers start at 1 and have no gaps.
 */

import type { Principal, TransferKind, TransferRecord } from "@mintline/types";
import type { TransferFilter } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Kind implied by which side of a movement is the void.
 */
export function transferKindOf(from: Principal | null, to: Principal | null): TransferKind {
  if (from === null && to !== null) return "mint";
  if (from !== null && to === null) return "burn";
  if (from !== null && to !== null) return "transfer";
  throw new LedgerError("INVALID_PRINCIPAL", "A transfer needs at least one side");
}

export class TransferLog {
  private readonly _records: TransferRecord[] = [];

  /**
   * Append a record, assigning the next sequence number.
   */
  append(
    from: Principal | null,
    to: Principal | null,
    amount: bigint,
    timestamp: string,
  ): TransferRecord {
    const record: TransferRecord = Object.freeze({
      sequence: this._records.length + 1,
      kind: transferKindOf(from, to),
      from,
      to,
      amount,
      timestamp,
    });
    this._records.push(record);
    return record;
  }

  /**
   * Records in sequence order, optionally filtered.
   */
  getAll(filter?: TransferFilter): readonly TransferRecord[] {
    if (filter === undefined) {
      return [...this._records];
    }

    const result: TransferRecord[] = [];
    for (const record of this.iterate(filter.fromSequence)) {
      if (filter.limit !== undefined && result.length >= filter.limit) {
        break;
      }
      if (filter.kind !== undefined && record.kind !== filter.kind) {
        continue;
      }
      if (
        filter.principal !== undefined &&
        record.from !== filter.principal &&
        record.to !== filter.principal
      ) {
        continue;
      }
      result.push(record);
    }
    return result;
  }

  /**
   * Lazily walk records starting at `fromSequence` (default 1).
   */
  *iterate(fromSequence = 1): Generator<TransferRecord, void, undefined> {
    for (let i = Math.max(fromSequence, 1) - 1; i < this._records.length; i++) {
      const record = this._records[i];
      if (record !== undefined) {
        yield record;
      }
    }
  }

  get length(): number {
    return this._records.length;
  }

  /**
   * Insert a previously serialized record. Its sequence must be next.
   */
  restore(record: TransferRecord): void {
    const expected = this._records.length + 1;
    if (record.sequence !== expected) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Transfer sequence gap: expected ${expected}, got ${record.sequence}`,
      );
    }
    if (record.kind !== transferKindOf(record.from, record.to)) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Transfer #${record.sequence} has kind "${record.kind}" inconsistent with its sides`,
      );
    }
    this._records.push(Object.freeze({ ...record }));
  }
}
