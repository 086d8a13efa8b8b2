/**
 * @custody-gate/event-store — Hash chain for the tamper-evident event log.
 *
 *   event[1].hash = sha256(canonicalize(event[1]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 *
 * Editing any stored event breaks the chain from that position on.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
} from "./types.js";

export const GENESIS_HASH = "genesis";

type ChainFields = Omit<StoredEvent, "hash" | "previousHash">;

/**
 * Hash an event's content together with its predecessor's hash.
 */
export function computeEventHash(event: ChainFields, previousHash: string): string {
  const content = canonicalize({
    event: event.event,
    streamId: event.streamId,
    version: event.version,
    globalPosition: event.globalPosition,
  });
  return createHash("sha256").update(content + previousHash).digest("hex");
}

/**
 * Verify the hash chain of events given in global position order.
 */
export function verifyHashChain(
  events: readonly StoredEvent[],
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let previousHash = GENESIS_HASH;
  let lastVerifiedPosition = 0;

  for (const stored of events) {
    if (stored.previousHash !== previousHash) {
      errors.push({
        position: stored.globalPosition,
        reason: `previousHash mismatch at position ${stored.globalPosition}`,
      });
    }

    const expected = computeEventHash(stored, stored.previousHash);
    if (stored.hash !== expected) {
      errors.push({
        position: stored.globalPosition,
        reason: `Hash mismatch at position ${stored.globalPosition}`,
      });
    }

    previousHash = stored.hash;
    if (errors.length === 0) {
      lastVerifiedPosition = stored.globalPosition;
    }
  }

  return { valid: errors.length === 0, lastVerifiedPosition, errors };
}
