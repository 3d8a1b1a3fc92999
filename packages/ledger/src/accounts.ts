/**
 * @mintline/ledger — Account table.
 *
 * Maps principals to balances. Accounts are created on first credit
 * or by an explicit createWallet, and are never removed.
 *
 * Rules:
 * - Reading an unknown principal's balance yields 0 without creating it
 * - Balances are replaced atomically as a batch
 * - No negative balance is ever stored
 * - Stored accounts are frozen; updates replace them
 */

import type { Principal } from "@mintline/types";
import type { Account } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * A pending balance change applied by `commit`.
 */
export interface BalanceUpdate {
  readonly principal: Principal;
  readonly balance: bigint;
}

export class AccountTable {
  private readonly _accounts: Map<Principal, Account> = new Map();

  /**
   * Get the account, inserting it with a zero balance if missing.
   */
  getOrCreate(principal: Principal, timestamp: string): { account: Account; created: boolean } {
    const existing = this._accounts.get(principal);
    if (existing !== undefined) {
      return { account: existing, created: false };
    }
    const account: Account = Object.freeze({ principal, balance: 0n, createdAt: timestamp });
    this._accounts.set(principal, account);
    return { account, created: true };
  }

  /**
   * Balance of `principal`, or 0 if the account does not exist.
   */
  balanceOf(principal: Principal): bigint {
    return this._accounts.get(principal)?.balance ?? 0n;
  }

  has(principal: Principal): boolean {
    return this._accounts.has(principal);
  }

  get(principal: Principal): Account | undefined {
    return this._accounts.get(principal);
  }

  /**
   * All accounts in creation order.
   */
  getAll(): readonly Account[] {
    return [...this._accounts.values()];
  }

  get count(): number {
    return this._accounts.size;
  }

  /**
   * Sum of every stored balance.
   */
  totalBalance(): bigint {
    let total = 0n;
    for (const account of this._accounts.values()) {
      total += account.balance;
    }
    return total;
  }

  /**
   * Apply a batch of balance updates. Missing accounts are created
   * with `timestamp`. Validation happens before anything is written.
   */
  commit(updates: readonly BalanceUpdate[], timestamp: string): void {
    for (const update of updates) {
      if (update.balance < 0n) {
        throw new LedgerError(
          "OVERFLOW",
          `Refusing to store negative balance for "${update.principal}"`,
        );
      }
    }

    for (const update of updates) {
      const existing = this._accounts.get(update.principal);
      this._accounts.set(
        update.principal,
        Object.freeze({
          principal: update.principal,
          balance: update.balance,
          createdAt: existing?.createdAt ?? timestamp,
        }),
      );
    }
  }

  /**
   * Insert a previously serialized account. Throws on duplicates.
   */
  restore(account: Account): void {
    if (this._accounts.has(account.principal)) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Duplicate account in snapshot: "${account.principal}"`,
      );
    }
    if (account.balance < 0n) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Negative balance in snapshot for "${account.principal}"`,
      );
    }
    this._accounts.set(account.principal, Object.freeze({ ...account }));
  }
}
