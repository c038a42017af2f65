/**
 * Hash chain for the event log.
 *
 * Each record is canonicalized with RFC 8785 (JCS) and hashed with SHA-256
 * together with its predecessor's hash:
 *
 *   record[1].hash = sha256(canonicalize(record[1]) + "genesis")
 *   record[n].hash = sha256(canonicalize(record[n]) + record[n-1].hash)
 *
 * Changing any record breaks every link after it.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
  UnhashedStoredEvent,
} from "./types.js";

export const GENESIS_HASH = "genesis";

function canonicalContent(record: UnhashedStoredEvent): string {
  return canonicalize({
    event: {
      type: record.event.type,
      metadata: record.event.metadata,
      payload: record.event.payload,
    },
    streamId: record.streamId,
    version: record.version,
    globalPosition: record.globalPosition,
    appendedAt: record.appendedAt,
  });
}

/**
 * Hex-encoded SHA-256 of a record linked to `previousHash`.
 */
export function computeEventHash(
  record: UnhashedStoredEvent,
  previousHash: string,
): string {
  return createHash("sha256")
    .update(canonicalContent(record) + previousHash)
    .digest("hex");
}

/**
 * Verify a sequence of records in global position order.
 *
 * Reports every broken link; `lastVerifiedPosition` is the position of the
 * last record before the first break.
 */
export function verifyHashChain(
  records: readonly StoredEvent[],
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let lastVerifiedPosition = 0;
  let previousHash = GENESIS_HASH;

  for (const record of records) {
    if (record.previousHash !== previousHash) {
      errors.push({
        position: record.globalPosition,
        reason: `previousHash mismatch at position ${record.globalPosition}: expected "${previousHash}", got "${record.previousHash}"`,
      });
    }

    const expected = computeEventHash(record, record.previousHash);
    if (record.hash !== expected) {
      errors.push({
        position: record.globalPosition,
        reason: `Hash mismatch at position ${record.globalPosition}: expected "${expected}", got "${record.hash}"`,
      });
    }

    if (errors.length === 0) {
      lastVerifiedPosition = record.globalPosition;
    }
    previousHash = record.hash;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}
