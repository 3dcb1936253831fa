/**
 * Runtime Type Guards
 *
 * Narrowing functions for token ledger domain types.
 * These enable safe runtime validation at system boundaries
 * (entry-point arguments, deserialized state, HTTP bodies).
 */

import type { AccountId, StorageBalance, TokenMetadata, U128String } from "./token.js";
import type { DomainEvent, EventMetadata } from "./event.js";

// =============================================================================
// Token guards
// =============================================================================

/** 2^128 - 1 */
export const U128_MAX = (1n << 128n) - 1n;

const DIGITS = /^\d+$/;
const ACCOUNT_ID = /^(([a-z\d]+[-_])*[a-z\d]+\.)*([a-z\d]+[-_])*[a-z\d]+$/;

export function isU128String(value: unknown): value is U128String {
  if (typeof value !== "string" || !DIGITS.test(value)) return false;
  return BigInt(value) <= U128_MAX;
}

export function isAccountId(value: unknown): value is AccountId {
  return (
    typeof value === "string" &&
    value.length >= 2 &&
    value.length <= 64 &&
    ACCOUNT_ID.test(value)
  );
}

function isOptionalString(value: unknown): value is string | null | undefined {
  return value === undefined || value === null || typeof value === "string";
}

export function isTokenMetadata(value: unknown): value is TokenMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.spec === "string" &&
    typeof v.name === "string" &&
    typeof v.symbol === "string" &&
    isOptionalString(v.icon) &&
    isOptionalString(v.reference) &&
    isOptionalString(v.referenceHash) &&
    typeof v.decimals === "number" &&
    Number.isInteger(v.decimals) &&
    v.decimals >= 0 &&
    v.decimals <= 255
  );
}

export function isStorageBalance(value: unknown): value is StorageBalance {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isU128String(v.total) && isU128String(v.available);
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["ledger", "registry", "storage"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
