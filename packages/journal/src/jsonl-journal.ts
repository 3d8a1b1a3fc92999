/**
 * @mintline/journal — File-based JSONL Journal implementation.
 *
 * Stores one JSON record per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each append flushes to disk via fsync before returning
 * - Partial writes (torn lines) are skipped on load; the next append
 *   starts on a fresh line so it never joins a torn tail
 * - The file is the source of truth; in-memory state is derived
 *
 * File format:
 * {"position":1,"committedAt":"...","payload":{...},"previousHash":"genesis","hash":"..."}
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
} from "node:fs";
import { dirname } from "node:path";
import { GENESIS_HASH, sealRecord, verifyHashChain } from "./hash-chain.js";
import { assertPayload } from "./in-memory-journal.js";
import type {
  Clock,
  Journal,
  JournalIntegrityResult,
  JournalRecord,
} from "./types.js";
import { JournalError } from "./types.js";

/**
 * Options for creating a JsonlJournal.
 */
export interface JsonlJournalOptions<TPayload> {
  /** Path to the JSONL file */
  readonly filePath: string;

  /** Guard applied to every payload read back from disk */
  readonly isPayload: (value: unknown) => value is TPayload;

  readonly clock?: Clock | undefined;
}

/**
 * File-based JSONL journal.
 *
 * The in-memory index is rebuilt from the file on construction.
 */
export class JsonlJournal<TPayload extends object> implements Journal<TPayload> {
  private readonly _filePath: string;
  private readonly _isPayload: (value: unknown) => value is TPayload;
  private readonly _clock: Clock;
  private readonly _records: JournalRecord<TPayload>[] = [];
  private _lastHash: string = GENESIS_HASH;
  private _skippedLines = 0;
  /** The file ends without a newline (torn write) */
  private _tornTail = false;

  /**
   * Create a new JsonlJournal.
   *
   * If the file exists, records are loaded from it.
   * If not, it is created on first append. The parent directory
   * is created if it doesn't exist.
   */
  constructor(options: JsonlJournalOptions<TPayload>) {
    this._filePath = options.filePath;
    this._isPayload = options.isPayload;
    this._clock = options.clock ?? (() => new Date().toISOString());

    mkdirSync(dirname(this._filePath), { recursive: true });
    this._loadFromFile();
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(payload: TPayload): JournalRecord<TPayload> {
    assertPayload(payload);

    const record = sealRecord(
      {
        position: this._records.length + 1,
        committedAt: this._clock(),
        payload,
      },
      this._lastHash,
    );

    const line = JSON.stringify(record) + "\n";
    this._writeAndSync(this._tornTail ? "\n" + line : line);

    // Update in-memory state only after a successful write
    this._tornTail = false;
    this._records.push(record);
    this._lastHash = record.hash;
    return record;
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(fromPosition = 1): readonly JournalRecord<TPayload>[] {
    if (fromPosition < 1) {
      throw new JournalError(
        "INVALID_POSITION",
        `fromPosition must be >= 1, got ${fromPosition}`,
      );
    }
    return this._records.slice(fromPosition - 1);
  }

  get size(): number {
    return this._records.length;
  }

  verifyIntegrity(): JournalIntegrityResult {
    return verifyHashChain(this._records);
  }

  /** Lines ignored on load (torn writes or foreign payloads) */
  get skippedLines(): number {
    return this._skippedLines;
  }

  get filePath(): string {
    return this._filePath;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Load records from the JSONL file into memory.
   *
   * Tolerates partial/corrupt lines (which can happen on unclean shutdown).
   */
  private _loadFromFile(): void {
    if (!existsSync(this._filePath)) {
      return;
    }

    const content = readFileSync(this._filePath, "utf-8");
    this._tornTail = content.length > 0 && !content.endsWith("\n");

    for (const line of content.split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        // Corrupt/partial line — skip (crash safety)
        this._skippedLines++;
        continue;
      }

      const record = this._toRecord(parsed);
      if (record === undefined) {
        this._skippedLines++;
        continue;
      }

      this._records.push(record);
      this._lastHash = record.hash;
    }
  }

  private _toRecord(value: unknown): JournalRecord<TPayload> | undefined {
    if (value === null || typeof value !== "object") {
      return undefined;
    }
    const v = value as Record<string, unknown>;
    const payload = v.payload;
    if (
      typeof v.position !== "number" ||
      typeof v.committedAt !== "string" ||
      typeof v.previousHash !== "string" ||
      typeof v.hash !== "string" ||
      !this._isPayload(payload)
    ) {
      return undefined;
    }
    return {
      position: v.position,
      committedAt: v.committedAt,
      payload,
      previousHash: v.previousHash,
      hash: v.hash,
    };
  }

  /**
   * Write data to the JSONL file and fsync for durability.
   */
  private _writeAndSync(data: string): void {
    try {
      const fd = openSync(this._filePath, "a");
      try {
        appendFileSync(fd, data, "utf-8");
        fsyncSync(fd);
      } finally {
        closeSync(fd);
      }
    } catch (err: unknown) {
      throw new JournalError(
        "WRITE_FAILED",
        `Failed to append to journal "${this._filePath}"`,
        { cause: err },
      );
    }
  }
}
