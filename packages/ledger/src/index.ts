/**
 * @mintline/ledger — Single-asset fungible token ledger.
 *
 * Provides:
 * - TokenLedger: mint, transfer, burn, ownership and queries
 * - Checked amount arithmetic and unit conversion
 * - Command dispatch with typed results
 * - Invariant checks, snapshots and journal replay
 *
 * @packageDocumentation
 */

// Core ledger
export { TokenLedger, DEFAULT_INITIAL_SUPPLY } from "./ledger.js";

// Types
export type {
  Account,
  CreateWalletResult,
  LedgerConfig,
  LedgerErrorCode,
  LedgerSnapshot,
  SnapshotAccount,
  SnapshotTransfer,
  TokenLedgerOptions,
  TransferFilter,
} from "./types.js";
export { LedgerError } from "./types.js";

// Amount math
export {
  MAX_AMOUNT,
  MAX_DECIMALS,
  assertPositiveAmount,
  assertValidDecimals,
  checkedAdd,
  checkedSub,
  toBaseUnits,
  parseBaseUnits,
  parseAmount,
  formatAmount,
} from "./amount-math.js";

// Building blocks
export { AccountTable } from "./accounts.js";
export type { BalanceUpdate } from "./accounts.js";
export { TransferLog, transferKindOf } from "./transfer-log.js";

// Commands
export { dispatch } from "./commands.js";
export type {
  CommandResult,
  CommandResultMap,
  LedgerCommand,
  LedgerCommandType,
  LedgerFailure,
  LedgerResult,
  ResultOf,
} from "./commands.js";

// Journal entries
export { isLedgerJournalEntry } from "./journal-entries.js";
export type {
  BurnEntry,
  ChangeOwnerEntry,
  CreateWalletEntry,
  InitializeEntry,
  LedgerJournalEntry,
  LedgerJournalEntryType,
  MintEntry,
  TransferEntry,
} from "./journal-entries.js";

// Invariants
export { checkInvariants } from "./invariants.js";
export type { InvariantCode, InvariantViolation } from "./invariants.js";
