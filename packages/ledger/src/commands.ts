/**
 * @mintline/ledger — Command dispatch.
 *
 * Every external call can be expressed as one LedgerCommand and run
 * through `dispatch`, which turns a LedgerError into a failed result.
 * Anything that is not a LedgerError (journal write failures, bugs)
 * propagates to the caller.
 */

import type { Principal, TokenInfo, TransferRecord } from "@mintline/types";
import type { TokenLedger } from "./ledger.js";
import type { CreateWalletResult, LedgerErrorCode, TransferFilter } from "./types.js";
import { LedgerError } from "./types.js";

// ─── Commands ────────────────────────────────────────────────────────────

export type LedgerCommand =
  | { readonly type: "create_wallet"; readonly caller: Principal }
  | {
      readonly type: "mint";
      readonly caller: Principal;
      readonly to: Principal;
      readonly amount: bigint;
    }
  | {
      readonly type: "transfer";
      readonly caller: Principal;
      readonly to: Principal;
      readonly amount: bigint;
    }
  | { readonly type: "burn"; readonly caller: Principal; readonly amount: bigint }
  | { readonly type: "change_owner"; readonly caller: Principal; readonly newOwner: Principal }
  | { readonly type: "get_balance"; readonly principal: Principal }
  | { readonly type: "get_token_info" }
  | { readonly type: "get_owner" }
  | { readonly type: "get_transfer_history"; readonly filter?: TransferFilter | undefined };

export type LedgerCommandType = LedgerCommand["type"];

/**
 * Success value produced by each command type.
 */
export interface CommandResultMap {
  create_wallet: CreateWalletResult;
  mint: TransferRecord;
  transfer: TransferRecord;
  burn: TransferRecord;
  /** The previous owner */
  change_owner: Principal;
  get_balance: bigint;
  get_token_info: TokenInfo;
  get_owner: Principal;
  get_transfer_history: readonly TransferRecord[];
}

export type ResultOf<C extends LedgerCommand> = CommandResultMap[C["type"]];

export type CommandResult = CommandResultMap[LedgerCommandType];

// ─── Results ─────────────────────────────────────────────────────────────

export interface LedgerFailure {
  readonly code: LedgerErrorCode;
  readonly message: string;
}

export type LedgerResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: LedgerFailure };

// ─── Dispatch ────────────────────────────────────────────────────────────

function run(ledger: TokenLedger, command: LedgerCommand): CommandResult {
  switch (command.type) {
    case "create_wallet":
      return ledger.createWallet(command.caller);
    case "mint":
      return ledger.mint(command.caller, command.to, command.amount);
    case "transfer":
      return ledger.transfer(command.caller, command.to, command.amount);
    case "burn":
      return ledger.burn(command.caller, command.amount);
    case "change_owner":
      return ledger.changeOwner(command.caller, command.newOwner);
    case "get_balance":
      return ledger.getBalance(command.principal);
    case "get_token_info":
      return ledger.getTokenInfo();
    case "get_owner":
      return ledger.getOwner();
    case "get_transfer_history":
      return ledger.getTransferHistory(command.filter);
  }
}

/**
 * Execute one command against `ledger`.
 */
export function dispatch<C extends LedgerCommand>(
  ledger: TokenLedger,
  command: C,
): LedgerResult<ResultOf<C>>;
export function dispatch(ledger: TokenLedger, command: LedgerCommand): LedgerResult<CommandResult> {
  try {
    return { ok: true, value: run(ledger, command) };
  } catch (err) {
    if (err instanceof LedgerError) {
      return { ok: false, error: { code: err.code, message: err.message } };
    }
    throw err;
  }
}
