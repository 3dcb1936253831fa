/**
 * @ft-ledger/ledger — Event Emitter.
 *
 * Collects the events and plain log lines of the call in progress.
 * Each event is rendered twice:
 *
 *   EVENT_JSON:{"standard":"nep141","version":"1.0.0","event":"ft_transfer","data":[{…}]}
 *
 * as a contract log line, and as a DomainEvent the host appends to the
 * event store once the call commits.
 */

import type { DomainEvent } from "@ft-ledger/types";
import type { TokenEventPayloads, TokenEventType } from "@ft-ledger/event-store";
import { createTokenEventCatalog } from "@ft-ledger/event-store";
import type { TokenEventRecord } from "./types.js";

export const EVENT_LOG_PREFIX = "EVENT_JSON:";
export const EVENT_STANDARD_VERSION = "1.0.0";

const catalog = createTokenEventCatalog();

/**
 * Render an event as an `EVENT_JSON:` log line.
 */
export function formatEventLog(record: TokenEventRecord): string {
  return (
    EVENT_LOG_PREFIX +
    JSON.stringify({
      standard: record.standard,
      version: EVENT_STANDARD_VERSION,
      event: record.type,
      data: [record.payload],
    })
  );
}

/**
 * Identity of the committed call the events belong to.
 */
export interface EventContext {
  readonly receiptId: string;
  readonly actor: string;
  readonly timestamp: string;
}

/**
 * Convert a call's events into DomainEvents.
 * Event IDs are `${receiptId}:${index}`; all share the receipt as correlation ID.
 */
export function toDomainEvents(
  records: readonly TokenEventRecord[],
  context: EventContext,
): DomainEvent[] {
  return records.map((record, index) => ({
    type: record.type,
    metadata: {
      eventId: `${context.receiptId}:${String(index)}`,
      timestamp: context.timestamp,
      actor: context.actor,
      correlationId: context.receiptId,
      source: catalog.getSchema(record.type)?.source ?? "ledger",
    },
    payload: record.payload,
  }));
}

export class EventEmitter {
  private _events: TokenEventRecord[] = [];
  private _logs: string[] = [];

  emit<K extends TokenEventType>(type: K, payload: TokenEventPayloads[K]): void {
    const record: TokenEventRecord<K> = {
      type,
      standard: catalog.getSchema(type)?.standard ?? "nep141",
      payload,
    };
    this._events.push(record);
    this._logs.push(formatEventLog(record));
  }

  /** Plain (non-event) log line. */
  log(message: string): void {
    this._logs.push(message);
  }

  /**
   * Hand over everything recorded since the last take and start afresh.
   */
  take(): { events: readonly TokenEventRecord[]; logs: readonly string[] } {
    const taken = { events: this._events, logs: this._logs };
    this.reset();
    return taken;
  }

  reset(): void {
    this._events = [];
    this._logs = [];
  }
}
