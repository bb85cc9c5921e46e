/**
 * @strongroom/event-store: Hash chain for tamper-evident audit logs.
 *
 * A vault's audit trail is sealed link by link. Every stored event is
 * reduced to its JCS (RFC 8785) form and hashed with SHA-256 together
 * with the hash of the event before it; the first link uses
 * GENESIS_HASH. Editing, dropping or reordering an entry changes every
 * hash after it.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  HashedStoredEvent,
  IntegrityError,
  StoredEvent,
} from "./types.js";

/**
 * The hash used as `previousHash` for the first event in the chain.
 */
export const GENESIS_HASH = "genesis";

/** The persisted fields of an event, without its chain links. */
function sealedContent({ event, streamId, version, globalPosition, appendedAt }: StoredEvent): string {
  return canonicalize({
    event: { type: event.type, metadata: event.metadata, payload: event.payload },
    streamId,
    version,
    globalPosition,
    appendedAt,
  });
}

/**
 * Compute the SHA-256 hash of an event given its predecessor's hash.
 *
 * @returns Hex-encoded SHA-256 hash
 */
export function computeEventHash(
  event: StoredEvent,
  previousHash: string,
): string {
  return createHash("sha256")
    .update(sealedContent(event))
    .update(previousHash)
    .digest("hex");
}

/**
 * Link a stored event onto the chain after `previousHash`.
 */
export function linkEvent(
  event: StoredEvent,
  previousHash: string,
): HashedStoredEvent {
  return { ...event, hash: computeEventHash(event, previousHash), previousHash };
}

/**
 * Verify the hash chain of a sequence of events in global position order.
 */
export function verifyHashChain(
  events: readonly HashedStoredEvent[],
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let lastVerifiedPosition = 0;
  let previousHash = GENESIS_HASH;

  for (const event of events) {
    if (event.previousHash !== previousHash) {
      errors.push({
        position: event.globalPosition,
        reason: `previousHash mismatch at position ${event.globalPosition}: expected "${previousHash}", got "${event.previousHash}"`,
      });
    }

    const expectedHash = computeEventHash(event, event.previousHash);
    if (event.hash !== expectedHash) {
      errors.push({
        position: event.globalPosition,
        reason: `Hash mismatch at position ${event.globalPosition}: expected "${expectedHash}", got "${event.hash}"`,
      });
    } else if (errors.length === 0) {
      lastVerifiedPosition = event.globalPosition;
    }

    previousHash = event.hash;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}
