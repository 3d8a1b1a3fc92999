/**
 * Shared fixtures for @mintline/ledger tests.
 */

import { InMemoryJournal, JournalError } from "@mintline/journal";
import type { Clock, JournalRecord } from "@mintline/journal";
import { TokenLedger } from "../src/ledger.js";
import type { LedgerJournalEntry } from "../src/journal-entries.js";
import type { LedgerConfig } from "../src/types.js";
import { LedgerError } from "../src/types.js";

export const OWNER = "owner";

export const CONFIG: LedgerConfig = {
  name: "Test Token",
  symbol: "TST",
  decimals: 2,
  owner: OWNER,
  initialSupply: 1_000_000n,
};

/**
 * Clock returning 2024-01-01T00:00:00.000Z, then one second later per call.
 */
export function steppingClock(): Clock {
  let tick = 0;
  return () => new Date(Date.UTC(2024, 0, 1) + 1000 * tick++).toISOString();
}

export function makeLedger(overrides?: Partial<LedgerConfig>): TokenLedger {
  return new TokenLedger({ ...CONFIG, ...overrides }, { clock: steppingClock() });
}

export function makeJournal(): InMemoryJournal<LedgerJournalEntry> {
  return new InMemoryJournal<LedgerJournalEntry>({ clock: steppingClock() });
}

/**
 * In-memory journal whose writes can be made to fail on demand.
 */
export class FlakyJournal extends InMemoryJournal<LedgerJournalEntry> {
  failWrites = false;

  constructor() {
    super({ clock: steppingClock() });
  }

  override append(payload: LedgerJournalEntry): JournalRecord<LedgerJournalEntry> {
    if (this.failWrites) {
      throw new JournalError("WRITE_FAILED", "simulated write failure");
    }
    return super.append(payload);
  }
}

/**
 * Run `fn` and return the code of the LedgerError it throws,
 * or undefined if it returns normally.
 */
export function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof LedgerError) {
      return err.code;
    }
    throw err;
  }
  return undefined;
}
