/**
 * @mintline/ledger — Core TokenLedger class.
 *
 * Single-asset fungible token ledger. Holds the account table, token
 * metadata, transfer log and owner, and is the only thing that mutates
 * them.
 *
 * API surface:
 * - createWallet() — Materialize an account (idempotent)
 * - mint() — Owner creates tokens for a recipient
 * - transfer() — Move tokens between two principals
 * - burn() — Destroy the caller's own tokens
 * - changeOwner() — Hand the owner role to another principal
 * - getBalance() / getTokenInfo() / getOwner() / getTransferHistory()
 * - snapshot() / fromSnapshot() — Serialize and restore
 * - checkInvariants() — Verify supply, balances and log ordering
 *
 * Every mutation validates first, then writes its journal entry, then
 * applies. A rejected operation or a failed journal write leaves the
 * ledger unchanged.
 */

import type { Clock, Journal } from "@mintline/journal";
import { isPrincipal, isTransferRecord } from "@mintline/types";
import type { Principal, TokenInfo, TransferRecord } from "@mintline/types";
import { AccountTable } from "./accounts.js";
import {
  MAX_AMOUNT,
  assertPositiveAmount,
  assertValidDecimals,
  checkedAdd,
  checkedSub,
  parseBaseUnits,
} from "./amount-math.js";
import { checkInvariants } from "./invariants.js";
import type { InvariantViolation } from "./invariants.js";
import type {
  BurnEntry,
  ChangeOwnerEntry,
  CreateWalletEntry,
  InitializeEntry,
  LedgerJournalEntry,
  MintEntry,
  TransferEntry,
} from "./journal-entries.js";
import { TransferLog } from "./transfer-log.js";
import type {
  Account,
  CreateWalletResult,
  LedgerConfig,
  LedgerSnapshot,
  TokenLedgerOptions,
  TransferFilter,
} from "./types.js";
import { LedgerError } from "./types.js";

/** Credited to the owner at deployment unless configured otherwise. */
export const DEFAULT_INITIAL_SUPPLY: bigint = 10n ** 18n;

const systemClock: Clock = () => new Date().toISOString();

function resolveSupply(config: LedgerConfig): { initialSupply: bigint; maxSupply: bigint } {
  if (typeof config.name !== "string" || config.name.trim() === "") {
    throw new LedgerError("INVALID_CONFIG", "Token name must not be empty");
  }
  if (typeof config.symbol !== "string" || config.symbol.trim() === "") {
    throw new LedgerError("INVALID_CONFIG", "Token symbol must not be empty");
  }
  assertValidDecimals(config.decimals);
  if (!isPrincipal(config.owner)) {
    throw new LedgerError("INVALID_CONFIG", "Owner must be a non-empty principal");
  }

  const maxSupply = config.maxSupply ?? MAX_AMOUNT;
  if (maxSupply <= 0n || maxSupply > MAX_AMOUNT) {
    throw new LedgerError(
      "INVALID_CONFIG",
      `maxSupply must be between 1 and ${MAX_AMOUNT.toString()}, got ${maxSupply.toString()}`,
    );
  }
  const initialSupply = config.initialSupply ?? DEFAULT_INITIAL_SUPPLY;
  if (initialSupply < 0n || initialSupply > maxSupply) {
    throw new LedgerError(
      "INVALID_CONFIG",
      `initialSupply must be between 0 and ${maxSupply.toString()}, got ${initialSupply.toString()}`,
    );
  }
  return { initialSupply, maxSupply };
}

export class TokenLedger {
  private _accounts: AccountTable = new AccountTable();
  private _transfers: TransferLog = new TransferLog();
  private readonly _journal: Journal<LedgerJournalEntry> | undefined;
  private readonly _clock: Clock;
  private readonly _name: string;
  private readonly _symbol: string;
  private readonly _decimals: number;
  private readonly _maxSupply: bigint;
  private _owner: Principal;
  private _totalSupply = 0n;

  /**
   * Deploy a ledger. With a non-empty journal the state is rebuilt by
   * replaying it; otherwise an `initialize` entry is written and the
   * initial supply is credited to the owner.
   *
   * @throws LedgerError INVALID_CONFIG for bad metadata, JOURNAL_MISMATCH
   *   when the journal belongs to a different ledger or fails to replay
   */
  constructor(config: LedgerConfig, options?: TokenLedgerOptions) {
    const { initialSupply, maxSupply } = resolveSupply(config);
    this._name = config.name;
    this._symbol = config.symbol;
    this._decimals = config.decimals;
    this._maxSupply = maxSupply;
    this._owner = config.owner;
    this._journal = options?.journal;
    this._clock = options?.clock ?? systemClock;

    if (this._journal !== undefined && this._journal.size > 0) {
      this._replay(this._journal, initialSupply);
      return;
    }

    const entry: InitializeEntry = {
      type: "initialize",
      name: this._name,
      symbol: this._symbol,
      decimals: this._decimals,
      owner: this._owner,
      initialSupply: initialSupply.toString(),
      maxSupply: maxSupply.toString(),
      timestamp: this._clock(),
    };
    this._write(entry);
    this._applyInitialize(entry);
  }

  /**
   * Open a ledger backed by `journal`, replaying it if it has records.
   */
  static open(
    config: LedgerConfig,
    journal: Journal<LedgerJournalEntry>,
    clock?: Clock,
  ): TokenLedger {
    return new TokenLedger(config, { journal, clock });
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  /**
   * Materialize an account for `principal` with a zero balance.
   * Calling it again for an existing account changes nothing.
   */
  createWallet(principal: Principal): CreateWalletResult {
    if (!isPrincipal(principal)) {
      throw new LedgerError("INVALID_PRINCIPAL", "Principal must be a non-empty string");
    }
    if (this._accounts.has(principal)) {
      return { principal, created: false };
    }

    const entry: CreateWalletEntry = {
      type: "create_wallet",
      principal,
      timestamp: this._clock(),
    };
    this._write(entry);
    this._applyCreateWallet(entry);
    return { principal, created: true };
  }

  /**
   * Create `amount` new tokens for `to`. Owner only.
   */
  mint(caller: Principal, to: Principal, amount: bigint): TransferRecord {
    this._validateMint(caller, to, amount);
    const entry: MintEntry = {
      type: "mint",
      caller,
      to,
      amount: amount.toString(),
      timestamp: this._clock(),
    };
    this._write(entry);
    return this._applyMint(entry);
  }

  /**
   * Move `amount` from the caller to `to`.
   */
  transfer(caller: Principal, to: Principal, amount: bigint): TransferRecord {
    this._validateTransfer(caller, to, amount);
    const entry: TransferEntry = {
      type: "transfer",
      from: caller,
      to,
      amount: amount.toString(),
      timestamp: this._clock(),
    };
    this._write(entry);
    return this._applyTransfer(entry);
  }

  /**
   * Destroy `amount` of the caller's own tokens.
   */
  burn(caller: Principal, amount: bigint): TransferRecord {
    this._validateBurn(caller, amount);
    const entry: BurnEntry = {
      type: "burn",
      from: caller,
      amount: amount.toString(),
      timestamp: this._clock(),
    };
    this._write(entry);
    return this._applyBurn(entry);
  }

  /**
   * Hand the owner role to `newOwner`. Returns the previous owner.
   * Naming the current owner again is a no-op.
   */
  changeOwner(caller: Principal, newOwner: Principal): Principal {
    this._validateChangeOwner(caller, newOwner);
    const previous = this._owner;
    if (newOwner === previous) {
      return previous;
    }

    const entry: ChangeOwnerEntry = {
      type: "change_owner",
      caller,
      newOwner,
      timestamp: this._clock(),
    };
    this._write(entry);
    this._applyChangeOwner(entry);
    return previous;
  }

  // ─── Validation ──────────────────────────────────────────────────────

  private _validateMint(caller: Principal, to: Principal, amount: bigint): void {
    if (caller !== this._owner) {
      throw new LedgerError("UNAUTHORIZED", `"${caller}" is not the owner and cannot mint`);
    }
    if (!isPrincipal(to)) {
      throw new LedgerError("INVALID_PRINCIPAL", "Mint recipient must be a non-empty string");
    }
    assertPositiveAmount(amount);
    checkedAdd(this._totalSupply, amount, this._maxSupply);
    checkedAdd(this._accounts.balanceOf(to), amount, this._maxSupply);
  }

  private _validateTransfer(caller: Principal, to: Principal, amount: bigint): void {
    if (!isPrincipal(caller) || !isPrincipal(to)) {
      throw new LedgerError("INVALID_PRINCIPAL", "Sender and recipient must be non-empty strings");
    }
    assertPositiveAmount(amount);
    if (caller === to) {
      throw new LedgerError("SAME_ACCOUNT", `Cannot transfer from "${caller}" to itself`);
    }
    const available = this._accounts.balanceOf(caller);
    if (available < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `"${caller}" has ${available.toString()}, needs ${amount.toString()}`,
      );
    }
    checkedAdd(this._accounts.balanceOf(to), amount, this._maxSupply);
  }

  private _validateBurn(caller: Principal, amount: bigint): void {
    assertPositiveAmount(amount);
    const available = this._accounts.balanceOf(caller);
    if (available < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `"${caller}" has ${available.toString()}, cannot burn ${amount.toString()}`,
      );
    }
  }

  private _validateChangeOwner(caller: Principal, newOwner: Principal): void {
    if (caller !== this._owner) {
      throw new LedgerError("UNAUTHORIZED", `"${caller}" is not the owner`);
    }
    if (!isPrincipal(newOwner)) {
      throw new LedgerError("INVALID_PRINCIPAL", "New owner must be a non-empty string");
    }
  }

  // ─── Apply (no validation, no failure) ───────────────────────────────

  private _applyInitialize(entry: InitializeEntry): void {
    const initialSupply = BigInt(entry.initialSupply);
    this._accounts.getOrCreate(entry.owner, entry.timestamp);
    if (initialSupply === 0n) {
      return;
    }
    this._accounts.commit([{ principal: entry.owner, balance: initialSupply }], entry.timestamp);
    this._totalSupply = initialSupply;
    this._transfers.append(null, entry.owner, initialSupply, entry.timestamp);
  }

  private _applyCreateWallet(entry: CreateWalletEntry): void {
    this._accounts.getOrCreate(entry.principal, entry.timestamp);
  }

  private _applyMint(entry: MintEntry): TransferRecord {
    const amount = BigInt(entry.amount);
    this._accounts.commit(
      [{ principal: entry.to, balance: this._accounts.balanceOf(entry.to) + amount }],
      entry.timestamp,
    );
    this._totalSupply += amount;
    return this._transfers.append(null, entry.to, amount, entry.timestamp);
  }

  private _applyTransfer(entry: TransferEntry): TransferRecord {
    const amount = BigInt(entry.amount);
    this._accounts.commit(
      [
        { principal: entry.from, balance: this._accounts.balanceOf(entry.from) - amount },
        { principal: entry.to, balance: this._accounts.balanceOf(entry.to) + amount },
      ],
      entry.timestamp,
    );
    return this._transfers.append(entry.from, entry.to, amount, entry.timestamp);
  }

  private _applyBurn(entry: BurnEntry): TransferRecord {
    const amount = BigInt(entry.amount);
    this._accounts.commit(
      [{ principal: entry.from, balance: checkedSub(this._accounts.balanceOf(entry.from), amount) }],
      entry.timestamp,
    );
    this._totalSupply -= amount;
    return this._transfers.append(entry.from, null, amount, entry.timestamp);
  }

  private _applyChangeOwner(entry: ChangeOwnerEntry): void {
    this._owner = entry.newOwner;
  }

  // ─── Journal ─────────────────────────────────────────────────────────

  private _write(entry: LedgerJournalEntry): void {
    this._journal?.append(entry);
  }

  private _replay(journal: Journal<LedgerJournalEntry>, initialSupply: bigint): void {
    const integrity = journal.verifyIntegrity();
    if (!integrity.valid) {
      const first = integrity.errors[0];
      throw new LedgerError(
        "JOURNAL_MISMATCH",
        `Journal failed integrity verification at position ${first?.position ?? 0}: ${first?.reason ?? "unknown"}`,
      );
    }

    const [head, ...rest] = journal.read();
    if (head === undefined || head.payload.type !== "initialize") {
      throw new LedgerError("JOURNAL_MISMATCH", "Journal does not start with an initialize entry");
    }
    const init = head.payload;
    if (
      init.name !== this._name ||
      init.symbol !== this._symbol ||
      init.decimals !== this._decimals ||
      init.owner !== this._owner ||
      init.initialSupply !== initialSupply.toString() ||
      init.maxSupply !== this._maxSupply.toString()
    ) {
      throw new LedgerError(
        "JOURNAL_MISMATCH",
        `Journal was written for ${init.name} (${init.symbol}, ${init.decimals} decimals, owner "${init.owner}"), not ${this._name} (${this._symbol}, ${this._decimals} decimals, owner "${this._owner}")`,
      );
    }
    this._applyInitialize(init);

    for (const record of rest) {
      try {
        this._replayEntry(record.payload);
      } catch (err) {
        if (err instanceof LedgerError) {
          throw new LedgerError(
            "JOURNAL_MISMATCH",
            `Journal entry at position ${record.position} does not replay: ${err.message}`,
            { cause: err },
          );
        }
        throw err;
      }
    }
  }

  private _replayEntry(entry: LedgerJournalEntry): void {
    switch (entry.type) {
      case "initialize":
        throw new LedgerError("JOURNAL_MISMATCH", "Duplicate initialize entry");
      case "create_wallet":
        if (!isPrincipal(entry.principal)) {
          throw new LedgerError("INVALID_PRINCIPAL", "Principal must be a non-empty string");
        }
        this._applyCreateWallet(entry);
        return;
      case "mint":
        this._validateMint(entry.caller, entry.to, parseBaseUnits(entry.amount));
        this._applyMint(entry);
        return;
      case "transfer":
        this._validateTransfer(entry.from, entry.to, parseBaseUnits(entry.amount));
        this._applyTransfer(entry);
        return;
      case "burn":
        this._validateBurn(entry.from, parseBaseUnits(entry.amount));
        this._applyBurn(entry);
        return;
      case "change_owner":
        this._validateChangeOwner(entry.caller, entry.newOwner);
        this._applyChangeOwner(entry);
        return;
    }
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Balance of `principal`; 0 for unknown principals.
   */
  getBalance(principal: Principal): bigint {
    return this._accounts.balanceOf(principal);
  }

  getTokenInfo(): TokenInfo {
    return {
      name: this._name,
      symbol: this._symbol,
      decimals: this._decimals,
      totalSupply: this._totalSupply,
    };
  }

  getOwner(): Principal {
    return this._owner;
  }

  get maxSupply(): bigint {
    return this._maxSupply;
  }

  /**
   * Transfer records in sequence order, optionally filtered.
   */
  getTransferHistory(filter?: TransferFilter): readonly TransferRecord[] {
    return this._transfers.getAll(filter);
  }

  /**
   * Lazily walk the transfer log. Each call starts a fresh walk.
   */
  iterateTransferHistory(fromSequence?: number): Generator<TransferRecord, void, undefined> {
    return this._transfers.iterate(fromSequence);
  }

  getAccounts(): readonly Account[] {
    return this._accounts.getAll();
  }

  hasAccount(principal: Principal): boolean {
    return this._accounts.has(principal);
  }

  get accountCount(): number {
    return this._accounts.count;
  }

  get transferCount(): number {
    return this._transfers.length;
  }

  checkInvariants(): readonly InvariantViolation[] {
    return checkInvariants(this.snapshot());
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  /**
   * Create a JSON-safe snapshot of the ledger.
   * Can be restored with TokenLedger.fromSnapshot().
   */
  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      token: {
        name: this._name,
        symbol: this._symbol,
        decimals: this._decimals,
        totalSupply: this._totalSupply.toString(),
      },
      maxSupply: this._maxSupply.toString(),
      owner: this._owner,
      accounts: this._accounts.getAll().map((account) => ({
        principal: account.principal,
        balance: account.balance.toString(),
        createdAt: account.createdAt,
      })),
      transfers: this._transfers.getAll().map((record) => ({
        sequence: record.sequence,
        kind: record.kind,
        from: record.from,
        to: record.to,
        amount: record.amount.toString(),
        timestamp: record.timestamp,
      })),
      createdAt: this._clock(),
    };
  }

  /**
   * Restore a ledger from a snapshot. The restored ledger has no journal.
   *
   * @throws LedgerError INVALID_SNAPSHOT if the snapshot is malformed or
   *   violates any invariant
   */
  static fromSnapshot(snapshot: LedgerSnapshot, options?: { clock?: Clock | undefined }): TokenLedger {
    if (snapshot.version !== 1) {
      throw new LedgerError("INVALID_SNAPSHOT", `Unsupported snapshot version: ${String(snapshot.version)}`);
    }
    const violations = checkInvariants(snapshot);
    const [firstViolation] = violations;
    if (firstViolation !== undefined) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Snapshot violates ${violations.length} invariant(s); first: ${firstViolation.code}: ${firstViolation.message}`,
      );
    }

    let ledger: TokenLedger;
    try {
      ledger = new TokenLedger(
        {
          name: snapshot.token.name,
          symbol: snapshot.token.symbol,
          decimals: snapshot.token.decimals,
          owner: snapshot.owner,
          initialSupply: 0n,
          maxSupply: parseBaseUnits(snapshot.maxSupply),
        },
        { clock: options?.clock },
      );
    } catch (err) {
      if (err instanceof LedgerError) {
        throw new LedgerError("INVALID_SNAPSHOT", err.message, { cause: err });
      }
      throw err;
    }

    const accounts = new AccountTable();
    const transfers = new TransferLog();
    try {
      for (const account of snapshot.accounts) {
        accounts.restore({
          principal: account.principal,
          balance: parseBaseUnits(account.balance),
          createdAt: account.createdAt,
        });
      }
      for (const transfer of snapshot.transfers) {
        const record = { ...transfer, amount: parseBaseUnits(transfer.amount) };
        if (!isTransferRecord(record)) {
          throw new LedgerError("INVALID_SNAPSHOT", `Malformed transfer #${transfer.sequence}`);
        }
        transfers.restore(record);
      }
    } catch (err) {
      if (err instanceof LedgerError && err.code !== "INVALID_SNAPSHOT") {
        throw new LedgerError("INVALID_SNAPSHOT", err.message, { cause: err });
      }
      throw err;
    }

    ledger._accounts = accounts;
    ledger._transfers = transfers;
    ledger._totalSupply = parseBaseUnits(snapshot.token.totalSupply);
    return ledger;
  }
}
