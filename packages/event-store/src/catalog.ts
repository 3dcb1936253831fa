/**
 * @ft-ledger/event-store — Event Catalog.
 *
 * Formalizes all domain events into a unified catalog with:
 * - Typed event definitions (type string → payload shape)
 * - Schema versions (reported in the event log envelope)
 * - Runtime payload validation at append time
 *
 * Design principles:
 * - Events are immutable after creation (no schema changes retroactively)
 * - A type is registered once; re-registering the same version is a no-op
 */

import type { EventMetadata } from "@ft-ledger/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g., "ft_transfer") */
  readonly type: string;

  /** Standard the event belongs to (e.g., "nep141") */
  readonly standard: string;

  /** Schema version, rendered as the envelope's `version` */
  readonly version: string;

  readonly description: string;

  /** Which component emits this event */
  readonly source: EventMetadata["source"];

  /**
   * Validate a payload against this schema.
   */
  validate(payload: unknown): boolean;
}

// =============================================================================
// Event Catalog
// =============================================================================

/**
 * Centralized registry of all domain event types.
 *
 * Usage:
 * ```ts
 * const catalog = new EventCatalog();
 *
 * catalog.register({
 *   type: "ft_burn",
 *   standard: "nep141",
 *   version: "1.0.0",
 *   description: "Tokens were destroyed",
 *   source: "ledger",
 *   validate: (p) => typeof p === "object" && p !== null && "owner_id" in p,
 * });
 * ```
 */
export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema.
   *
   * @throws CatalogError if the type is already registered with another version
   */
  register(schema: EventSchema): void {
    const existing = this._schemas.get(schema.type);

    if (existing !== undefined) {
      if (existing.version === schema.version) {
        return;
      }
      throw new CatalogError(
        `Event type "${schema.type}" is already registered at version ${existing.version}`,
      );
    }

    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  /**
   * List all registered event types, sorted.
   */
  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listBySource(source: EventMetadata["source"]): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * Validate an event payload against its registered schema.
   *
   * @returns true if valid, false if invalid or unregistered
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    if (schema === undefined) {
      return false;
    }
    return schema.validate(payload);
  }

  get size(): number {
    return this._schemas.size;
  }
}

// =============================================================================
// Errors
// =============================================================================

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
