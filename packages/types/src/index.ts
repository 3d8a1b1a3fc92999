/**
 * @mintline/types — Shared domain types for the Mintline stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Identity
export type { Principal } from "./principal.js";

// Token primitives
export type { TokenInfo, TransferKind, TransferRecord } from "./token.js";

// Runtime type guards
export {
  isPrincipal,
  isTransferKind,
  isTokenInfo,
  isTransferRecord,
} from "./guards.js";
