/**
 * @mintline/ledger — Ledger invariant checks.
 *
 * Pure assertions over a LedgerSnapshot. Used by readiness probes,
 * by snapshot restore, and by property tests.
 *
 * Invariants:
 * - NEGATIVE_BALANCE: no balance below zero
 * - SUPPLY_MISMATCH: total supply equals the sum of all balances
 * - SUPPLY_EXCEEDS_MAX: total supply within the configured maximum
 * - SEQUENCE_GAP: transfer sequences are 1, 2, 3, ... with no gaps
 * - REPLAY_MISMATCH: replaying the transfer log reproduces every balance
 * - MISSING_OWNER: exactly one valid owner
 */

import { isPrincipal } from "@mintline/types";
import type { Principal } from "@mintline/types";
import { MAX_AMOUNT } from "./amount-math.js";
import type { LedgerSnapshot } from "./types.js";

export type InvariantCode =
  | "MALFORMED_AMOUNT"
  | "NEGATIVE_BALANCE"
  | "SUPPLY_MISMATCH"
  | "SUPPLY_EXCEEDS_MAX"
  | "SEQUENCE_GAP"
  | "REPLAY_MISMATCH"
  | "MISSING_OWNER";

export interface InvariantViolation {
  readonly code: InvariantCode;
  readonly message: string;
}

function parseSigned(value: string): bigint | undefined {
  return /^-?\d+$/.test(value) ? BigInt(value) : undefined;
}

/**
 * Check every ledger invariant. Returns an empty array when all hold.
 */
export function checkInvariants(snapshot: LedgerSnapshot): readonly InvariantViolation[] {
  const violations: InvariantViolation[] = [];

  if (!isPrincipal(snapshot.owner)) {
    violations.push({ code: "MISSING_OWNER", message: "Ledger has no valid owner" });
  }

  const totalSupply = parseSigned(snapshot.token.totalSupply);
  const maxSupply = parseSigned(snapshot.maxSupply);
  if (totalSupply === undefined || maxSupply === undefined) {
    violations.push({
      code: "MALFORMED_AMOUNT",
      message: `Malformed supply: totalSupply="${snapshot.token.totalSupply}", maxSupply="${snapshot.maxSupply}"`,
    });
    return violations;
  }

  // Balances
  const balances = new Map<Principal, bigint>();
  let sum = 0n;
  for (const account of snapshot.accounts) {
    const balance = parseSigned(account.balance);
    if (balance === undefined) {
      violations.push({
        code: "MALFORMED_AMOUNT",
        message: `Malformed balance for "${account.principal}": "${account.balance}"`,
      });
      continue;
    }
    if (balance < 0n) {
      violations.push({
        code: "NEGATIVE_BALANCE",
        message: `Balance of "${account.principal}" is negative: ${balance.toString()}`,
      });
    }
    balances.set(account.principal, balance);
    sum += balance;
  }

  // Supply
  if (sum !== totalSupply) {
    violations.push({
      code: "SUPPLY_MISMATCH",
      message: `Total supply ${totalSupply.toString()} != sum of balances ${sum.toString()}`,
    });
  }
  if (totalSupply > maxSupply || maxSupply > MAX_AMOUNT) {
    violations.push({
      code: "SUPPLY_EXCEEDS_MAX",
      message: `Total supply ${totalSupply.toString()} exceeds maximum ${maxSupply.toString()}`,
    });
  }

  // Transfer log ordering and replay
  const replayed = new Map<Principal, bigint>();
  let replayedSupply = 0n;
  const credit = (principal: Principal, amount: bigint): void => {
    replayed.set(principal, (replayed.get(principal) ?? 0n) + amount);
  };

  snapshot.transfers.forEach((record, index) => {
    if (record.sequence !== index + 1) {
      violations.push({
        code: "SEQUENCE_GAP",
        message: `Transfer at index ${index} has sequence ${record.sequence}, expected ${index + 1}`,
      });
    }
    const amount = parseSigned(record.amount);
    if (amount === undefined || amount <= 0n) {
      violations.push({
        code: "MALFORMED_AMOUNT",
        message: `Transfer #${record.sequence} has invalid amount "${record.amount}"`,
      });
      return;
    }
    if (record.from !== null) credit(record.from, -amount);
    if (record.to !== null) credit(record.to, amount);
    if (record.from === null) replayedSupply += amount;
    if (record.to === null) replayedSupply -= amount;
  });

  if (replayedSupply !== totalSupply) {
    violations.push({
      code: "REPLAY_MISMATCH",
      message: `Replayed supply ${replayedSupply.toString()} != total supply ${totalSupply.toString()}`,
    });
  }
  const principals = new Set<Principal>([...balances.keys(), ...replayed.keys()]);
  for (const principal of principals) {
    const expected = replayed.get(principal) ?? 0n;
    const actual = balances.get(principal) ?? 0n;
    if (expected !== actual) {
      violations.push({
        code: "REPLAY_MISMATCH",
        message: `Replayed balance of "${principal}" is ${expected.toString()}, stored ${actual.toString()}`,
      });
    }
  }

  return violations;
}
