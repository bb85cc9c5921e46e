/**
 * @strongroom/event-store: Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a tamper-evident hash chain
 * - The vault's domain event catalog
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  HashedStoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, linkEvent, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions, SubscriberErrorHandler } from "./in-memory-store.js";

// Vault domain events
export { VAULT_EVENTS, isVaultEventType } from "./vault-events.js";
export type {
  VaultEventType,
  VaultEventPayloads,
  CeilingName,
  DepositRecordedPayload,
  WithdrawalRecordedPayload,
  OracleReferenceChangedPayload,
  CeilingChangedPayload,
} from "./vault-events.js";
