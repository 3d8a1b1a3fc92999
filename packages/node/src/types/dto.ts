/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Amounts travel as unsigned base-unit integer strings; bigint never
 * reaches JSON.stringify.
 */

import { z } from "zod";
import type { Account, LedgerSnapshot } from "@mintline/ledger";
import type { TokenInfo, TransferKind, TransferRecord } from "@mintline/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "amount must be an unsigned integer string of base units");

/** Trimmed like the X-Principal header, so both name the same account. */
export const PrincipalSchema = z.string().trim().min(1);

// =============================================================================
// Request DTOs
// =============================================================================

export const MintSchema = z.object({
  to: PrincipalSchema,
  amount: AmountSchema,
});

export type MintDto = z.infer<typeof MintSchema>;

export const TransferSchema = z.object({
  to: PrincipalSchema,
  amount: AmountSchema,
});

export type TransferDto = z.infer<typeof TransferSchema>;

export const BurnSchema = z.object({
  amount: AmountSchema,
});

export type BurnDto = z.infer<typeof BurnSchema>;

export const ChangeOwnerSchema = z.object({
  newOwner: PrincipalSchema,
});

export type ChangeOwnerDto = z.infer<typeof ChangeOwnerSchema>;

export const ListTransfersQuerySchema = z.object({
  principal: PrincipalSchema.optional(),
  kind: z.enum(["mint", "transfer", "burn"]).optional(),
  fromSequence: z.coerce.number().int().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});

export type ListTransfersQuery = z.infer<typeof ListTransfersQuerySchema>;

// =============================================================================
// Response DTOs
// =============================================================================

export interface TokenInfoDto {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly totalSupply: string;
}

export interface TransferRecordDto {
  readonly sequence: number;
  readonly kind: TransferKind;
  readonly from: string | null;
  readonly to: string | null;
  readonly amount: string;
  readonly timestamp: string;
}

export interface BalanceDto {
  readonly principal: string;
  readonly balance: string;
}

export function toTokenInfoDto(info: TokenInfo): TokenInfoDto {
  return { ...info, totalSupply: info.totalSupply.toString() };
}

export function toTransferRecordDto(record: TransferRecord): TransferRecordDto {
  return { ...record, amount: record.amount.toString() };
}

export function toBalanceDto(account: Pick<Account, "principal" | "balance">): BalanceDto {
  return { principal: account.principal, balance: account.balance.toString() };
}

/** Snapshots are already JSON-safe. */
export type SnapshotDto = LedgerSnapshot;
