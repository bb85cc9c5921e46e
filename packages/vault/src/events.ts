/**
 * Vault event construction.
 *
 * Builds DomainEvents from the @strongroom/event-store catalog with
 * fresh metadata. Payload types are checked against the event type.
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventSource } from "@strongroom/types";
import type { VaultEventPayloads, VaultEventType } from "@strongroom/event-store";

export interface EventContext {
  readonly actor: string;
  readonly source: EventSource;
  /** Groups the event with the request that caused it; generated when absent */
  readonly correlationId?: string | undefined;
}

export function buildVaultEvent<T extends VaultEventType>(
  type: T,
  payload: VaultEventPayloads[T],
  context: EventContext,
): DomainEvent {
  return {
    type,
    metadata: {
      eventId: randomUUID(),
      timestamp: new Date().toISOString(),
      actor: context.actor,
      correlationId: context.correlationId ?? randomUUID(),
      source: context.source,
    },
    payload,
  };
}
