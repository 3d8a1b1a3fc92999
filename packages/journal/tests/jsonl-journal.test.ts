/**
 * Tests for JsonlJournal.
 *
 * Verifies:
 * - Persistence: records survive journal recreation
 * - Crash safety: partial/corrupt lines are skipped
 * - Payload validation on load
 * - Write failures leave in-memory state untouched
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { appendFileSync, existsSync, mkdirSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { JsonlJournal } from "../src/jsonl-journal.js";
import { JournalError } from "../src/types.js";

// =============================================================================
// Helpers
// =============================================================================

interface Payload {
  readonly type: string;
}

function isPayload(value: unknown): value is Payload {
  return (
    value !== null &&
    typeof value === "object" &&
    typeof (value as Record<string, unknown>).type === "string"
  );
}

let testDir: string;
let testFile: string;

function open(filePath: string = testFile): JsonlJournal<Payload> {
  return new JsonlJournal<Payload>({ filePath, isPayload });
}

beforeEach(() => {
  testDir = join(tmpdir(), `mintline-journal-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);
  mkdirSync(testDir, { recursive: true });
  testFile = join(testDir, "ledger.jsonl");
});

afterEach(() => {
  rmSync(testDir, { recursive: true, force: true });
});

// =============================================================================
// File Creation
// =============================================================================

describe("file creation", () => {
  it("creates the file on first append", () => {
    const journal = open();
    expect(existsSync(testFile)).toBe(false);

    journal.append({ type: "mint" });

    expect(existsSync(testFile)).toBe(true);
  });

  it("creates nested directories", () => {
    const nested = join(testDir, "deep", "nested", "ledger.jsonl");
    open(nested).append({ type: "mint" });
    expect(existsSync(nested)).toBe(true);
  });

  it("writes one JSON record per line", () => {
    const journal = open();
    journal.append({ type: "a" });
    journal.append({ type: "b" });

    const lines = readFileSync(testFile, "utf-8").trim().split("\n");
    expect(lines).toHaveLength(2);
    const second = JSON.parse(lines[1] ?? "") as { position: number; payload: Payload };
    expect(second.position).toBe(2);
    expect(second.payload).toEqual({ type: "b" });
  });
});

// =============================================================================
// Persistence
// =============================================================================

describe("persistence", () => {
  it("records survive journal recreation", () => {
    const first = open();
    first.append({ type: "a" });
    first.append({ type: "b" });

    const second = open();
    expect(second.size).toBe(2);
    expect(second.read().map((r) => r.payload.type)).toEqual(["a", "b"]);
    expect(second.verifyIntegrity().valid).toBe(true);
  });

  it("continues the position sequence and hash chain after reload", () => {
    const first = open();
    const last = first.append({ type: "a" });

    const second = open();
    const next = second.append({ type: "b" });

    expect(next.position).toBe(2);
    expect(next.previousHash).toBe(last.hash);
    expect(second.verifyIntegrity().valid).toBe(true);
  });
});

// =============================================================================
// Crash Safety
// =============================================================================

describe("crash safety", () => {
  it("skips a torn line at the end of the file", () => {
    const first = open();
    first.append({ type: "a" });
    appendFileSync(testFile, '{"position":2,"committedAt":"2025-01', "utf-8");

    const second = open();
    expect(second.size).toBe(1);
    expect(second.skippedLines).toBe(1);
  });

  it("keeps a record appended after a torn tail", () => {
    const first = open();
    first.append({ type: "a" });
    appendFileSync(testFile, '{"position":2,"committedAt":"2025-01', "utf-8");

    const second = open();
    const record = second.append({ type: "b" });
    expect(record.position).toBe(2);

    const third = open();
    expect(third.size).toBe(2);
    expect(third.skippedLines).toBe(1);
    expect(third.read().map((r) => r.payload.type)).toEqual(["a", "b"]);
    expect(third.verifyIntegrity().valid).toBe(true);
  });

  it("does not add blank lines when the file ends cleanly", () => {
    open().append({ type: "a" });
    open().append({ type: "b" });

    const lines = readFileSync(testFile, "utf-8").split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe("");
  });

  it("skips records whose payload fails the guard", () => {
    const first = open();
    first.append({ type: "a" });
    appendFileSync(
      testFile,
      JSON.stringify({ position: 2, committedAt: "t", payload: { kind: 1 }, previousHash: "x", hash: "y" }) + "\n",
      "utf-8",
    );

    const second = open();
    expect(second.size).toBe(1);
    expect(second.skippedLines).toBe(1);
  });

  it("reports a tampered record through verifyIntegrity", () => {
    const first = open();
    first.append({ type: "a" });
    const content = readFileSync(testFile, "utf-8").replace('"type":"a"', '"type":"z"');
    rmSync(testFile);
    appendFileSync(testFile, content, "utf-8");

    const result = open().verifyIntegrity();
    expect(result.valid).toBe(false);
    expect(result.errors[0]?.position).toBe(1);
  });
});

// =============================================================================
// Write failure
// =============================================================================

describe("write failure", () => {
  it("throws WRITE_FAILED and keeps the in-memory state", () => {
    const journal = open();
    // A directory at the file path makes openSync fail
    mkdirSync(testFile);

    let caught: unknown;
    try {
      journal.append({ type: "a" });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(JournalError);
    expect((caught as JournalError).code).toBe("WRITE_FAILED");
    expect(journal.size).toBe(0);
  });
});
