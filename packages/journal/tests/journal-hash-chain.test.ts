/**
 * Tests for the journal hash chain — tamper-evident records.
 */

import { describe, it, expect } from "vitest";
import {
  computeRecordHash,
  sealRecord,
  verifyHashChain,
  GENESIS_HASH,
} from "../src/hash-chain.js";
import type { JournalRecord } from "../src/types.js";

const TS = "2025-01-01T00:00:00.000Z";

function chain(payloads: readonly Record<string, unknown>[]): JournalRecord<Record<string, unknown>>[] {
  const records: JournalRecord<Record<string, unknown>>[] = [];
  let previousHash = GENESIS_HASH;
  payloads.forEach((payload, i) => {
    const record = sealRecord({ position: i + 1, committedAt: TS, payload }, previousHash);
    records.push(record);
    previousHash = record.hash;
  });
  return records;
}

// =============================================================================
// computeRecordHash
// =============================================================================

describe("computeRecordHash", () => {
  const content = { position: 1, committedAt: TS, payload: { type: "mint" } };

  it("produces a 64-char hex string", () => {
    expect(computeRecordHash(content, GENESIS_HASH)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is deterministic for the same input", () => {
    expect(computeRecordHash(content, GENESIS_HASH)).toBe(
      computeRecordHash(content, GENESIS_HASH),
    );
  });

  it("ignores payload key order (canonical JSON)", () => {
    const a = { position: 1, committedAt: TS, payload: { x: "1", y: "2" } };
    const b = { position: 1, committedAt: TS, payload: { y: "2", x: "1" } };
    expect(computeRecordHash(a, GENESIS_HASH)).toBe(computeRecordHash(b, GENESIS_HASH));
  });

  it("changes when the payload changes", () => {
    const modified = { ...content, payload: { type: "burn" } };
    expect(computeRecordHash(content, GENESIS_HASH)).not.toBe(
      computeRecordHash(modified, GENESIS_HASH),
    );
  });

  it("changes when previousHash changes", () => {
    expect(computeRecordHash(content, GENESIS_HASH)).not.toBe(
      computeRecordHash(content, "other"),
    );
  });
});

// =============================================================================
// verifyHashChain
// =============================================================================

describe("verifyHashChain", () => {
  it("accepts an empty chain", () => {
    expect(verifyHashChain([])).toEqual({ valid: true, lastVerifiedPosition: 0, errors: [] });
  });

  it("accepts a well-formed chain", () => {
    const records = chain([{ n: 1 }, { n: 2 }, { n: 3 }]);
    const result = verifyHashChain(records);
    expect(result.valid).toBe(true);
    expect(result.lastVerifiedPosition).toBe(3);
  });

  it("links the first record to genesis", () => {
    const [first] = chain([{ n: 1 }]);
    expect(first?.previousHash).toBe(GENESIS_HASH);
  });

  it("detects a tampered payload", () => {
    const records = chain([{ n: 1 }, { n: 2 }, { n: 3 }]);
    const tampered = records.map((r) =>
      r.position === 2 ? { ...r, payload: { n: 99 } } : r,
    );

    const result = verifyHashChain(tampered);
    expect(result.valid).toBe(false);
    expect(result.lastVerifiedPosition).toBe(1);
    expect(result.errors[0]?.position).toBe(2);
    expect(result.errors[0]?.reason).toMatch(/^Hash mismatch at position 2/);
  });

  it("detects a removed record", () => {
    const records = chain([{ n: 1 }, { n: 2 }, { n: 3 }]);
    const result = verifyHashChain(records.filter((r) => r.position !== 2));

    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.reason)).toContain("Position gap: expected 2, got 3");
  });
});
