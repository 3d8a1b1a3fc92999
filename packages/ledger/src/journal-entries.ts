/**
 * @mintline/ledger — Journal entry payloads.
 *
 * One entry per committed mutation, written before the in-memory state
 * changes. Amounts are decimal strings so entries survive JSON.
 * Replaying the entries in order rebuilds the ledger exactly.
 */

import { isPrincipal } from "@mintline/types";
import type { Principal } from "@mintline/types";

export interface InitializeEntry {
  readonly type: "initialize";
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly owner: Principal;
  readonly initialSupply: string;
  readonly maxSupply: string;
  readonly timestamp: string;
}

export interface CreateWalletEntry {
  readonly type: "create_wallet";
  readonly principal: Principal;
  readonly timestamp: string;
}

export interface MintEntry {
  readonly type: "mint";
  readonly caller: Principal;
  readonly to: Principal;
  readonly amount: string;
  readonly timestamp: string;
}

export interface TransferEntry {
  readonly type: "transfer";
  readonly from: Principal;
  readonly to: Principal;
  readonly amount: string;
  readonly timestamp: string;
}

export interface BurnEntry {
  readonly type: "burn";
  readonly from: Principal;
  readonly amount: string;
  readonly timestamp: string;
}

export interface ChangeOwnerEntry {
  readonly type: "change_owner";
  readonly caller: Principal;
  readonly newOwner: Principal;
  readonly timestamp: string;
}

export type LedgerJournalEntry =
  | InitializeEntry
  | CreateWalletEntry
  | MintEntry
  | TransferEntry
  | BurnEntry
  | ChangeOwnerEntry;

export type LedgerJournalEntryType = LedgerJournalEntry["type"];

const AMOUNT_PATTERN = /^\d+$/;

function isAmountString(value: unknown): value is string {
  return typeof value === "string" && AMOUNT_PATTERN.test(value);
}

/**
 * Runtime guard used when reading entries back from disk.
 */
export function isLedgerJournalEntry(value: unknown): value is LedgerJournalEntry {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (typeof v.timestamp !== "string") return false;

  switch (v.type) {
    case "initialize":
      return (
        typeof v.name === "string" &&
        typeof v.symbol === "string" &&
        typeof v.decimals === "number" &&
        Number.isInteger(v.decimals) &&
        isPrincipal(v.owner) &&
        isAmountString(v.initialSupply) &&
        isAmountString(v.maxSupply)
      );
    case "create_wallet":
      return isPrincipal(v.principal);
    case "mint":
      return isPrincipal(v.caller) && isPrincipal(v.to) && isAmountString(v.amount);
    case "transfer":
      return isPrincipal(v.from) && isPrincipal(v.to) && isAmountString(v.amount);
    case "burn":
      return isPrincipal(v.from) && isAmountString(v.amount);
    case "change_owner":
      return isPrincipal(v.caller) && isPrincipal(v.newOwner);
    default:
      return false;
  }
}
