/**
 * @ft-ledger/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface: one append-only stream per contract account
 * - InMemoryEventStore with hash-chained records
 * - EventCatalog for payload validation
 * - Token ledger event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  HashedStoredEvent,
  AppendResult,
  ReadOptions,
  ReadAllOptions,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError, isHashedEvent } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Token domain events
export { TOKEN_EVENTS, createTokenEventCatalog } from "./token-events.js";
export type {
  TokenEventType,
  TokenEventPayloads,
  FtMintPayload,
  FtTransferPayload,
  FtBurnPayload,
  FtTransferSettledPayload,
  StorageDepositPayload,
  StorageWithdrawPayload,
  StorageUnregisterPayload,
} from "./token-events.js";
