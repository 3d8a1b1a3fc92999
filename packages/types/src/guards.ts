/**
 * Runtime Type Guards
 *
 * Narrowing functions for Mintline domain types, used where values
 * cross a boundary (deserialized snapshots, journal replay, API inputs).
 */

import type { Principal } from "./principal.js";
import type { TokenInfo, TransferKind, TransferRecord } from "./token.js";

const TRANSFER_KINDS = new Set<string>(["mint", "transfer", "burn"]);

export function isPrincipal(value: unknown): value is Principal {
  return typeof value === "string" && value.length > 0;
}

export function isTransferKind(value: unknown): value is TransferKind {
  return typeof value === "string" && TRANSFER_KINDS.has(value);
}

export function isTokenInfo(value: unknown): value is TokenInfo {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.name === "string" &&
    typeof v.symbol === "string" &&
    typeof v.decimals === "number" &&
    Number.isInteger(v.decimals) &&
    v.decimals >= 0 &&
    typeof v.totalSupply === "bigint" &&
    v.totalSupply >= 0n
  );
}

/**
 * A record is well-formed when its kind agrees with its null sides:
 * mint has no `from`, burn has no `to`, transfer has both.
 */
export function isTransferRecord(value: unknown): value is TransferRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  const { kind, from, to } = v;
  if (
    typeof v.sequence !== "number" ||
    !Number.isInteger(v.sequence) ||
    v.sequence < 1 ||
    typeof v.amount !== "bigint" ||
    v.amount <= 0n ||
    typeof v.timestamp !== "string" ||
    !isTransferKind(kind)
  ) {
    return false;
  }

  switch (kind) {
    case "mint":
      return from === null && isPrincipal(to);
    case "burn":
      return isPrincipal(from) && to === null;
    case "transfer":
      return isPrincipal(from) && isPrincipal(to) && from !== to;
  }
}
