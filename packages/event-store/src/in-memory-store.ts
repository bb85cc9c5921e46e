/**
 * @strongroom/event-store: In-memory EventStore implementation.
 *
 * One global log holds every event in append order; each stream keeps
 * the indexes of its events in that log. The hash chain runs across the
 * global log, so a vault's audit trail and any other stream sharing the
 * store are covered by one integrity check.
 *
 * No durability: suited to tests and to a vault process that ships its
 * audit trail elsewhere.
 */

import type { DomainEvent } from "@strongroom/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ExpectedVersion,
  HashedStoredEvent,
  ReadAllOptions,
  ReadDirection,
  ReadOptions,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { GENESIS_HASH, linkEvent, verifyHashChain } from "./hash-chain.js";

/** Subscriber key for handlers that see every stream */
const ALL_STREAMS = Symbol("all-streams");

type SubscriberKey = string | typeof ALL_STREAMS;

/**
 * Receives the error of a subscriber that threw while being notified.
 */
export type SubscriberErrorHandler = (error: unknown, event: HashedStoredEvent) => void;

export interface InMemoryEventStoreOptions {
  /**
   * Report subscriber failures here instead of failing the append.
   * Without it, `append` throws SUBSCRIBER_FAILED once every subscriber
   * has run; the events are stored either way.
   */
  readonly onSubscriberError?: SubscriberErrorHandler | undefined;
}

export class InMemoryEventStore implements EventStore {
  private readonly _log: HashedStoredEvent[] = [];
  private readonly _streamIndex = new Map<string, number[]>();
  private readonly _subscribers = new Map<SubscriberKey, Set<EventHandler>>();
  private readonly _onSubscriberError: SubscriberErrorHandler | undefined;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this._onSubscriberError = options.onSubscriberError;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    requireStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const currentVersion = this.streamVersion(streamId);
    checkExpectedVersion(streamId, currentVersion, options?.expectedVersion);

    const appendedAt = new Date().toISOString();
    const index = this._streamIndex.get(streamId) ?? [];
    let previousHash = this._log[this._log.length - 1]?.hash ?? GENESIS_HASH;

    const stored = events.map((event, i) => {
      const linked = linkEvent(
        {
          event: { type: event.type, metadata: event.metadata, payload: event.payload },
          streamId,
          version: currentVersion + i + 1,
          globalPosition: this._log.length + i + 1,
          appendedAt,
        },
        previousHash,
      );
      previousHash = linked.hash;
      return linked;
    });

    for (const event of stored) {
      index.push(this._log.length);
      this._log.push(event);
    }
    this._streamIndex.set(streamId, index);

    this._notify(streamId, stored);

    return {
      streamId,
      fromVersion: currentVersion + 1,
      toVersion: currentVersion + stored.length,
      count: stored.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly HashedStoredEvent[] {
    requireStreamId(streamId);

    if (options?.fromVersion !== undefined && options.fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${options.fromVersion}`,
        streamId,
      );
    }

    const stream = (this._streamIndex.get(streamId) ?? []).flatMap((i) => this._log[i] ?? []);
    return selectRange(stream, (e) => e.version, options?.fromVersion, options?.direction, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    return selectRange(
      this._log,
      (e) => e.globalPosition,
      options?.fromPosition,
      options?.direction,
      options?.maxCount,
    );
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    requireStreamId(streamId);
    return this._register(streamId, handler);
  }

  subscribeAll(handler: EventHandler): Subscription {
    return this._register(ALL_STREAMS, handler);
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streamIndex.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._log.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._log);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _register(key: SubscriberKey, handler: EventHandler): Subscription {
    const handlers = this._subscribers.get(key) ?? new Set<EventHandler>();
    handlers.add(handler);
    this._subscribers.set(key, handlers);

    return {
      unsubscribe: () => {
        handlers.delete(handler);
        if (handlers.size === 0) {
          this._subscribers.delete(key);
        }
      },
    };
  }

  /**
   * Every subscriber sees every event, even after another one threw.
   */
  private _notify(streamId: string, events: readonly HashedStoredEvent[]): void {
    const keys: SubscriberKey[] = [streamId, ALL_STREAMS];
    let firstFailure: { error: unknown; event: HashedStoredEvent } | undefined = undefined;

    for (const key of keys) {
      const handlers = this._subscribers.get(key);
      if (handlers === undefined) continue;
      for (const handler of handlers) {
        for (const event of events) {
          try {
            handler(event);
          } catch (error) {
            if (this._onSubscriberError !== undefined) {
              this._onSubscriberError(error, event);
            } else {
              firstFailure ??= { error, event };
            }
          }
        }
      }
    }

    if (firstFailure !== undefined) {
      const { error, event } = firstFailure;
      throw new EventStoreError(
        "SUBSCRIBER_FAILED",
        `Subscriber failed on event at position ${event.globalPosition}: ${
          error instanceof Error ? error.message : String(error)
        }`,
        streamId,
        { cause: error },
      );
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function requireStreamId(streamId: string): void {
  if (streamId.length === 0) {
    throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
  }
}

function checkExpectedVersion(
  streamId: string,
  currentVersion: number,
  expected: ExpectedVersion | undefined,
): void {
  if (expected === undefined || expected === "any") {
    return;
  }
  if (expected === "no_stream") {
    if (currentVersion !== 0) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" already exists (version ${currentVersion}), expected no_stream`,
        streamId,
      );
    }
    return;
  }
  if (currentVersion !== expected) {
    throw new EventStoreError(
      "CONCURRENCY_CONFLICT",
      `Stream "${streamId}" is at version ${currentVersion}, expected ${expected}`,
      streamId,
    );
  }
}

/**
 * Slice an ordered sequence starting at `from` (inclusive) in the given
 * direction. Backward reads start at the end when `from` is absent.
 */
function selectRange(
  events: readonly HashedStoredEvent[],
  positionOf: (event: HashedStoredEvent) => number,
  from: number | undefined,
  direction: ReadDirection = "forward",
  maxCount?: number,
): HashedStoredEvent[] {
  const selected =
    direction === "forward"
      ? events.filter((e) => from === undefined || positionOf(e) >= from)
      : events.filter((e) => from === undefined || positionOf(e) <= from).reverse();

  return maxCount !== undefined && maxCount >= 0 ? selected.slice(0, maxCount) : selected;
}
