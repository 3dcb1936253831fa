/**
 * @ft-ledger/event-store — In-memory EventStore.
 *
 * One global log plus a per-stream index into it. Versions and positions
 * are contiguous from 1, so "everything after N" is a slice from index N.
 */

import type { DomainEvent } from "@ft-ledger/types";
import type { EventCatalog } from "./catalog.js";
import type {
  AppendResult,
  EventStore,
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** When set, every appended event must be registered and pass its validator */
  readonly catalog?: EventCatalog | undefined;

  /** Clock for `appendedAt`. Default: wall clock */
  readonly now?: (() => string) | undefined;
}

export class InMemoryEventStore implements EventStore {
  private readonly _log: HashedStoredEvent[] = [];
  private readonly _streams = new Map<string, HashedStoredEvent[]>();
  private readonly _catalog: EventCatalog | undefined;
  private readonly _now: () => string;

  constructor(options?: InMemoryEventStoreOptions) {
    this._catalog = options?.catalog;
    this._now = options?.now ?? (() => new Date().toISOString());
  }

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    assertStreamId(streamId);
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }
    for (const event of events) {
      this._check(streamId, event);
    }

    const stream = this._streams.get(streamId) ?? [];
    const fromVersion = stream.length + 1;
    const appendedAt = this._now();
    let previousHash = this._log.at(-1)?.hash ?? GENESIS_HASH;

    const batch = events.map((event, i): HashedStoredEvent => {
      const base: StoredEvent = {
        event: { type: event.type, metadata: event.metadata, payload: event.payload },
        streamId,
        version: fromVersion + i,
        globalPosition: this._log.length + i + 1,
        appendedAt,
      };
      const hash = computeEventHash(base, previousHash);
      const stored = { ...base, hash, previousHash };
      previousHash = hash;
      return stored;
    });

    this._log.push(...batch);
    stream.push(...batch);
    this._streams.set(streamId, stream);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + batch.length - 1,
      lastPosition: this._log.length,
    };
  }

  read(streamId: string, options?: ReadOptions): readonly HashedStoredEvent[] {
    assertStreamId(streamId);
    const after = checkedOffset(options?.afterVersion, "afterVersion");
    return window(this._streams.get(streamId) ?? [], after, options?.limit);
  }

  readAll(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    const after = checkedOffset(options?.afterPosition, "afterPosition");
    return window(this._log, after, options?.limit);
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._log);
  }

  private _check(streamId: string, event: DomainEvent): void {
    if (this._catalog === undefined) return;
    if (!this._catalog.validate(event.type, event.payload)) {
      throw new EventStoreError(
        "INVALID_EVENT",
        `Event "${event.type}" is not registered or its payload is invalid`,
        streamId,
      );
    }
  }
}

function assertStreamId(streamId: string): void {
  if (streamId.length === 0) {
    throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
  }
}

function checkedOffset(value: number | undefined, name: string): number {
  if (value === undefined) return 0;
  if (!Number.isInteger(value) || value < 0) {
    throw new EventStoreError(
      "INVALID_POSITION",
      `${name} must be a non-negative integer, got ${String(value)}`,
    );
  }
  return value;
}

function window<T>(events: readonly T[], after: number, limit: number | undefined): T[] {
  return limit === undefined ? events.slice(after) : events.slice(after, after + Math.max(limit, 0));
}
