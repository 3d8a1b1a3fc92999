/**
 * LedgerService — Composition root for the hosted ledger.
 *
 * Route handlers delegate to this service; they never touch the
 * TokenLedger or its journal directly. The node hosts exactly one
 * ledger, so there is exactly one LedgerService.
 */

import pino from "pino";
import type { Logger } from "pino";
import { InMemoryJournal, JsonlJournal } from "@mintline/journal";
import type { Clock, Journal, JournalIntegrityResult } from "@mintline/journal";
import { TokenLedger, dispatch, isLedgerJournalEntry } from "@mintline/ledger";
import type {
  InvariantViolation,
  LedgerCommand,
  LedgerConfig,
  LedgerJournalEntry,
  LedgerResult,
  LedgerSnapshot,
  ResultOf,
} from "@mintline/ledger";

// =============================================================================
// Configuration
// =============================================================================

export interface LedgerServiceConfig {
  readonly token: LedgerConfig;
  /** JSONL journal file. Memory-only when omitted. */
  readonly journalPath?: string | undefined;
  readonly logger?: Logger | undefined;
  readonly clock?: Clock | undefined;
}

export interface ReadinessReport {
  readonly ready: boolean;
  readonly journal: JournalIntegrityResult;
  readonly invariants: readonly InvariantViolation[];
}

const MUTATIONS = new Set<LedgerCommand["type"]>([
  "create_wallet",
  "mint",
  "transfer",
  "burn",
  "change_owner",
]);

/**
 * Loggable fields of a command; amounts as strings.
 */
function describeCommand(command: LedgerCommand): Record<string, string> {
  switch (command.type) {
    case "create_wallet":
      return { caller: command.caller };
    case "mint":
    case "transfer":
      return { caller: command.caller, to: command.to, amount: command.amount.toString() };
    case "burn":
      return { caller: command.caller, amount: command.amount.toString() };
    case "change_owner":
      return { caller: command.caller, newOwner: command.newOwner };
    case "get_balance":
      return { principal: command.principal };
    case "get_token_info":
    case "get_owner":
    case "get_transfer_history":
      return {};
  }
}

// =============================================================================
// Service
// =============================================================================

export class LedgerService {
  readonly ledger: TokenLedger;
  readonly journal: Journal<LedgerJournalEntry>;

  private readonly _logger: Logger;
  private _ready = false;

  constructor(config: LedgerServiceConfig) {
    this._logger = (config.logger ?? pino({ level: "silent" })).child({ component: "ledger" });

    let skippedLines = 0;
    if (config.journalPath !== undefined) {
      const jsonl = new JsonlJournal<LedgerJournalEntry>({
        filePath: config.journalPath,
        isPayload: isLedgerJournalEntry,
        clock: config.clock,
      });
      skippedLines = jsonl.skippedLines;
      this.journal = jsonl;
    } else {
      this.journal = new InMemoryJournal<LedgerJournalEntry>({ clock: config.clock });
    }

    const replayed = this.journal.size;
    this.ledger = new TokenLedger(config.token, { journal: this.journal, clock: config.clock });

    if (skippedLines > 0) {
      this._logger.warn(
        { skippedLines, journalPath: config.journalPath },
        "Skipped unreadable journal lines",
      );
    }
    this._logger.info(
      {
        symbol: config.token.symbol,
        owner: this.ledger.getOwner(),
        replayedEntries: replayed,
        persistent: config.journalPath !== undefined,
      },
      replayed > 0 ? "Ledger restored from journal" : "Ledger initialized",
    );

    this._ready = true;
  }

  // ─── Commands ──────────────────────────────────────────────────────

  /**
   * Run one command. Mutations are logged: committed at info,
   * rejected at warn.
   */
  execute<C extends LedgerCommand>(command: C): LedgerResult<ResultOf<C>> {
    const result = dispatch(this.ledger, command);

    if (MUTATIONS.has(command.type)) {
      const fields = { command: command.type, ...describeCommand(command) };
      if (result.ok) {
        this._logger.info({ ...fields, journalSize: this.journal.size }, "Ledger mutation committed");
      } else {
        this._logger.warn({ ...fields, code: result.error.code }, result.error.message);
      }
    }

    return result;
  }

  snapshot(): LedgerSnapshot {
    return this.ledger.snapshot();
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  /**
   * Deep readiness: journal hash chain and ledger invariants.
   */
  checkReadiness(): ReadinessReport {
    const journal = this.journal.verifyIntegrity();
    const invariants = this.ledger.checkInvariants();
    return {
      ready: this._ready && journal.valid && invariants.length === 0,
      journal,
      invariants,
    };
  }

  isReady(): boolean {
    return this._ready;
  }

  stop(): void {
    this._ready = false;
    this._logger.info({ journalSize: this.journal.size }, "Ledger service stopped");
  }
}
