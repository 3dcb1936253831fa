/**
 * Event Types
 *
 * Append-only event architecture.
 * Every committed mutation of the token ledger is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which call)
 * - Events of an aborted call are never recorded
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Account whose call caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID of the call receipt, shared by all events of one call */
  readonly correlationId: string;

  /** Which component emitted this event */
  readonly source: "ledger" | "registry" | "storage";
}

/**
 * A domain event.
 * Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "ft_transfer", "storage_deposit") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
