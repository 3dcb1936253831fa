/**
 * @ft-ledger/event-store — Core types.
 *
 * The store holds the events of committed contract calls. Each contract
 * account owns one stream; a call's events land in it as one batch, and
 * every record is chained to the one before it across all streams.
 */

import type { DomainEvent, EventMetadata } from "@ft-ledger/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store.
 */
export interface StoredEvent<TPayload = Record<string, unknown>> {
  readonly event: Readonly<{
    readonly type: string;
    readonly metadata: EventMetadata;
    readonly payload: Readonly<TPayload>;
  }>;

  /** Contract account the event belongs to */
  readonly streamId: string;

  /** 1-based, contiguous within the stream */
  readonly version: number;

  /** 1-based, contiguous across the whole store */
  readonly globalPosition: number;

  readonly appendedAt: string;
}

/**
 * A stored event linked into the tamper-evident hash chain.
 */
export interface HashedStoredEvent<TPayload = Record<string, unknown>>
  extends StoredEvent<TPayload> {
  /** SHA-256 over this event's canonical content and `previousHash` */
  readonly hash: string;

  /** Hash of the event one global position earlier, or "genesis" */
  readonly previousHash: string;
}

export function isHashedEvent(event: StoredEvent): event is HashedStoredEvent {
  return (
    "hash" in event &&
    typeof event.hash === "string" &&
    "previousHash" in event &&
    typeof event.previousHash === "string"
  );
}

// =============================================================================
// Append / Read
// =============================================================================

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;

  /** Global position of the last event of the batch */
  readonly lastPosition: number;
}

export interface ReadOptions {
  /** Only events with a higher stream version. Default: 0 */
  readonly afterVersion?: number | undefined;

  readonly limit?: number | undefined;
}

export interface ReadAllOptions {
  /** Only events with a higher global position. Default: 0 */
  readonly afterPosition?: number | undefined;

  readonly limit?: number | undefined;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;

  /** Global position of the last event whose hash verified */
  readonly lastVerifiedPosition: number;

  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store. Records are never updated or removed.
 */
export interface EventStore {
  /**
   * Append a batch of events to a stream. Either every event of the batch
   * is stored or none is.
   *
   * @throws EventStoreError on an empty batch, an empty stream ID or an
   *   event the store's catalog rejects
   */
  append(streamId: string, events: readonly DomainEvent[]): AppendResult;

  /** Events of one stream in version order; empty for an unknown stream. */
  read(streamId: string, options?: ReadOptions): readonly HashedStoredEvent[];

  /** Events of every stream in global order. */
  readAll(options?: ReadAllOptions): readonly HashedStoredEvent[];

  /** Recompute the hash chain over every stored event. */
  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_POSITION"
  | "INVALID_EVENT";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
