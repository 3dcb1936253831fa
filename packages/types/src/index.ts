/**
 * @ft-ledger/types — Shared domain types for the token ledger stack.
 *
 * These types are used across all packages:
 * - Token primitives (amounts, accounts, metadata, storage balances)
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Token types
export type {
  AccountId,
  U128String,
  TokenMetadata,
  StorageBalance,
  StorageBalanceBounds,
} from "./token.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
} from "./event.js";

// Runtime type guards
export {
  U128_MAX,
  isU128String,
  isAccountId,
  isTokenMetadata,
  isStorageBalance,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
