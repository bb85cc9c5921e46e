/**
 * Runtime Type Guards
 *
 * Narrowing functions used where untyped data enters the system:
 * request bodies, restored snapshots and stored events.
 */

import type { Address, AssetId } from "./asset.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

const EVENT_SOURCES: ReadonlySet<string> = new Set<EventSource>(["vault", "admin"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

/**
 * Only the two variants the vault holds: native, or stable with a token.
 */
export function isAssetId(value: unknown): value is AssetId {
  if (!isRecord(value)) return false;
  switch (value["kind"]) {
    case "native":
      return true;
    case "stable":
      return isAddress(value["token"]);
    default:
      return false;
  }
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  const source = value["source"];
  return (
    ["eventId", "timestamp", "actor", "correlationId"].every(
      (field) => typeof value[field] === "string",
    ) &&
    typeof source === "string" &&
    EVENT_SOURCES.has(source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  return (
    isRecord(value) &&
    typeof value["type"] === "string" &&
    isEventMetadata(value["metadata"]) &&
    isRecord(value["payload"])
  );
}
