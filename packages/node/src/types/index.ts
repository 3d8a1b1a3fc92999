/**
 * Type barrel — re-exports all public types from @mintline/node.
 */

// DTOs
export {
  AmountSchema,
  PrincipalSchema,
  MintSchema,
  TransferSchema,
  BurnSchema,
  ChangeOwnerSchema,
  ListTransfersQuerySchema,
  toTokenInfoDto,
  toTransferRecordDto,
  toBalanceDto,
} from "./dto.js";
export type {
  MintDto,
  TransferDto,
  BurnDto,
  ChangeOwnerDto,
  ListTransfersQuery,
  TokenInfoDto,
  TransferRecordDto,
  BalanceDto,
  SnapshotDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv, PrincipalEnv, ValidatedEnv, ValidatedQueryEnv } from "./api-contract.js";
