/**
 * @mintline/journal — Hash chain for tamper-evident journals.
 *
 * Each record is hashed using RFC 8785 (JCS) canonicalization + SHA-256.
 * The hash includes the previous record's hash, forming a chain:
 *
 *   record[1].hash = sha256(canonicalize(record[1]) + "genesis")
 *   record[n].hash = sha256(canonicalize(record[n]) + record[n-1].hash)
 *
 * Any modification to any record breaks the chain from that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  IntegrityError,
  JournalIntegrityResult,
  JournalRecord,
  JournalRecordContent,
} from "./types.js";

/**
 * The hash used as `previousHash` for the first record in the chain.
 */
export const GENESIS_HASH = "genesis";

/**
 * Compute the SHA-256 hash of a record given its predecessor's hash.
 *
 * @returns Hex-encoded SHA-256 hash
 */
export function computeRecordHash<TPayload>(
  record: JournalRecordContent<TPayload>,
  previousHash: string,
): string {
  const content = canonicalize({
    position: record.position,
    committedAt: record.committedAt,
    payload: record.payload,
  });
  return createHash("sha256").update(content + previousHash).digest("hex");
}

/**
 * Build a hashed record linked to `previousHash`.
 */
export function sealRecord<TPayload>(
  content: JournalRecordContent<TPayload>,
  previousHash: string,
): JournalRecord<TPayload> {
  return {
    position: content.position,
    committedAt: content.committedAt,
    payload: content.payload,
    previousHash,
    hash: computeRecordHash(content, previousHash),
  };
}

/**
 * Verify the hash chain of a sequence of records.
 *
 * Records must be in position order starting at 1.
 */
export function verifyHashChain<TPayload>(
  records: readonly JournalRecord<TPayload>[],
): JournalIntegrityResult {
  const errors: IntegrityError[] = [];
  let lastVerifiedPosition = 0;
  let previousHash = GENESIS_HASH;
  let expectedPosition = 1;

  for (const record of records) {
    let clean = true;

    if (record.position !== expectedPosition) {
      clean = false;
      errors.push({
        position: record.position,
        reason: `Position gap: expected ${expectedPosition}, got ${record.position}`,
      });
    }

    if (record.previousHash !== previousHash) {
      clean = false;
      errors.push({
        position: record.position,
        reason: `previousHash mismatch at position ${record.position}: expected "${previousHash}", got "${record.previousHash}"`,
      });
    }

    const expectedHash = computeRecordHash(record, record.previousHash);
    if (record.hash !== expectedHash) {
      clean = false;
      errors.push({
        position: record.position,
        reason: `Hash mismatch at position ${record.position}: expected "${expectedHash}", got "${record.hash}"`,
      });
    }

    if (clean && errors.length === 0) {
      lastVerifiedPosition = record.position;
    }

    previousHash = record.hash;
    expectedPosition = record.position + 1;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}
