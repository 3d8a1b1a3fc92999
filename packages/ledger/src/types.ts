/**
 * @mintline/ledger — Internal types for the token ledger.
 *
 * These extend the shared @mintline/types with ledger-specific
 * structures used only within this package.
 *
 * Rules:
 * - All types are readonly
 * - No mutation of stored records
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { Clock, Journal } from "@mintline/journal";
import type { Principal, TransferKind } from "@mintline/types";
import type { LedgerJournalEntry } from "./journal-entries.js";

// ─── Configuration ───────────────────────────────────────────────────────

/**
 * Parameters fixed when a ledger is deployed.
 */
export interface LedgerConfig {
  readonly name: string;
  readonly symbol: string;
  /** Integer in [0, 18] */
  readonly decimals: number;
  /** The deployer; becomes the single owner */
  readonly owner: Principal;
  /** Base units credited to the owner at deployment. Default: 10^18 */
  readonly initialSupply?: bigint | undefined;
  /** Upper bound for total supply and every balance. Default: MAX_AMOUNT */
  readonly maxSupply?: bigint | undefined;
}

/**
 * Runtime collaborators of a TokenLedger.
 */
export interface TokenLedgerOptions {
  /** Write-ahead journal. Without one the ledger is memory-only. */
  readonly journal?: Journal<LedgerJournalEntry> | undefined;
  /** Source of ISO-8601 timestamps. Default: the system clock */
  readonly clock?: Clock | undefined;
}

// ─── Accounts ────────────────────────────────────────────────────────────

/**
 * A materialized account. Accounts are never removed; a zero balance
 * is a valid terminal state.
 */
export interface Account {
  readonly principal: Principal;
  readonly balance: bigint;
  readonly createdAt: string;
}

/**
 * Result of createWallet. `created` is false when the account existed.
 */
export interface CreateWalletResult {
  readonly principal: Principal;
  readonly created: boolean;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_BALANCE"
  | "OVERFLOW"
  | "SAME_ACCOUNT"
  | "INVALID_PRINCIPAL"
  | "INVALID_CONFIG"
  | "INVALID_SNAPSHOT"
  | "JOURNAL_MISMATCH";

/**
 * Structured error from the ledger engine.
 * Always thrown by ledger methods; `dispatch` converts it into a result.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Query Types ─────────────────────────────────────────────────────────

/**
 * Filter criteria for querying the transfer log.
 */
export interface TransferFilter {
  /** Match records where this principal is either side */
  readonly principal?: Principal | undefined;
  readonly kind?: TransferKind | undefined;
  /** First sequence number to include */
  readonly fromSequence?: number | undefined;
  /** Maximum number of records returned */
  readonly limit?: number | undefined;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

export interface SnapshotAccount {
  readonly principal: Principal;
  /** Base units as a decimal integer string */
  readonly balance: string;
  readonly createdAt: string;
}

export interface SnapshotTransfer {
  readonly sequence: number;
  readonly kind: TransferKind;
  readonly from: Principal | null;
  readonly to: Principal | null;
  readonly amount: string;
  readonly timestamp: string;
}

/**
 * Serializable snapshot of the entire ledger state.
 * Amounts are strings so the snapshot survives JSON.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly token: {
    readonly name: string;
    readonly symbol: string;
    readonly decimals: number;
    readonly totalSupply: string;
  };
  readonly maxSupply: string;
  readonly owner: Principal;
  readonly accounts: readonly SnapshotAccount[];
  readonly transfers: readonly SnapshotTransfer[];
  readonly createdAt: string;
}
