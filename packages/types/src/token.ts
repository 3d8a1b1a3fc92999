/**
 * Token Types
 *
 * Primitives for a single fungible asset.
 *
 * Rules:
 * - All amounts are bigint base units (never floating point)
 * - A null side of a transfer is the void: mints come from it, burns go to it
 * - Records are immutable once appended
 */

import type { Principal } from "./principal.js";

/**
 * Metadata describing the token held by a ledger.
 */
export interface TokenInfo {
  /** Human-readable token name (e.g., "Mintline Token") */
  readonly name: string;

  /** Ticker symbol (e.g., "MLT") */
  readonly symbol: string;

  /** Number of decimal places between a whole token and one base unit */
  readonly decimals: number;

  /** Sum of every balance, in base units */
  readonly totalSupply: bigint;
}

/**
 * Kind of a transfer record, derived from which side is null.
 */
export type TransferKind = "mint" | "transfer" | "burn";

/**
 * A completed movement of tokens.
 */
export interface TransferRecord {
  /** Position in the transfer log (1-based, gap-free) */
  readonly sequence: number;

  readonly kind: TransferKind;

  /** Debited principal, or null for a mint */
  readonly from: Principal | null;

  /** Credited principal, or null for a burn */
  readonly to: Principal | null;

  /** Amount moved, in base units (always > 0) */
  readonly amount: bigint;

  /** ISO 8601 timestamp */
  readonly timestamp: string;
}
