/**
 * Tests for ledger invariant checks.
 */

import { describe, it, expect } from "vitest";
import { checkInvariants } from "../src/invariants.js";
import type { LedgerSnapshot } from "../src/types.js";
import { OWNER, makeLedger } from "./helpers.js";

function healthySnapshot(): LedgerSnapshot {
  const ledger = makeLedger();
  ledger.mint(OWNER, "bob", 500n);
  ledger.transfer("bob", "carol", 200n);
  ledger.burn("carol", 50n);
  return ledger.snapshot();
}

function codes(snapshot: LedgerSnapshot): string[] {
  return checkInvariants(snapshot).map((v) => v.code);
}

describe("checkInvariants", () => {
  it("reports nothing for a healthy ledger", () => {
    expect(checkInvariants(healthySnapshot())).toEqual([]);
  });

  it("reports a missing owner", () => {
    expect(codes({ ...healthySnapshot(), owner: "" })).toEqual(["MISSING_OWNER"]);
  });

  it("reports a supply that disagrees with balances and log", () => {
    const snap = healthySnapshot();
    const tampered = { ...snap, token: { ...snap.token, totalSupply: "1" } };
    expect(codes(tampered)).toEqual(["SUPPLY_MISMATCH", "REPLAY_MISMATCH"]);
  });

  it("reports a negative balance", () => {
    const snap = healthySnapshot();
    const tampered = {
      ...snap,
      accounts: snap.accounts.map((a) => (a.principal === "carol" ? { ...a, balance: "-150" } : a)),
    };
    expect(codes(tampered)).toEqual(["NEGATIVE_BALANCE", "SUPPLY_MISMATCH", "REPLAY_MISMATCH"]);
  });

  it("reports a supply above the maximum", () => {
    const snap = healthySnapshot();
    expect(codes({ ...snap, maxSupply: "1000" })).toEqual(["SUPPLY_EXCEEDS_MAX"]);
  });

  it("reports sequence gaps", () => {
    const snap = healthySnapshot();
    const tampered = {
      ...snap,
      transfers: snap.transfers.map((t) => (t.sequence === 3 ? { ...t, sequence: 5 } : t)),
    };
    expect(codes(tampered)).toEqual(["SEQUENCE_GAP"]);
  });

  it("reports balances the transfer log cannot reproduce", () => {
    const snap = healthySnapshot();
    const tampered = {
      ...snap,
      accounts: snap.accounts.map((a) => {
        if (a.principal === "bob") return { ...a, balance: "250" };
        if (a.principal === "carol") return { ...a, balance: "200" };
        return a;
      }),
    };
    expect(codes(tampered)).toEqual(["REPLAY_MISMATCH", "REPLAY_MISMATCH"]);
  });

  it("reports malformed amounts", () => {
    const snap = healthySnapshot();
    expect(codes({ ...snap, maxSupply: "lots" })).toEqual(["MALFORMED_AMOUNT"]);
  });
});
