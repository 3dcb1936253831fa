/**
 * Runtime type guard tests for @ft-ledger/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  U128_MAX,
  isU128String,
  isAccountId,
  isTokenMetadata,
  isStorageBalance,
  isEventMetadata,
  isDomainEvent,
} from "../src/guards.js";

// =============================================================================
// Token guards
// =============================================================================

describe("isU128String", () => {
  it("accepts zero and ordinary amounts", () => {
    expect(isU128String("0")).toBe(true);
    expect(isU128String("1000000000000000")).toBe(true);
  });

  it("accepts the 128-bit ceiling", () => {
    expect(isU128String(U128_MAX.toString())).toBe(true);
    expect(U128_MAX.toString()).toBe("340282366920938463463374607431768211455");
  });

  it("rejects values above the ceiling", () => {
    expect(isU128String("340282366920938463463374607431768211456")).toBe(false);
  });

  it("rejects signs, decimals and non-strings", () => {
    expect(isU128String("-1")).toBe(false);
    expect(isU128String("1.5")).toBe(false);
    expect(isU128String("")).toBe(false);
    expect(isU128String(" 1")).toBe(false);
    expect(isU128String(1)).toBe(false);
    expect(isU128String(1n)).toBe(false);
  });
});

describe("isAccountId", () => {
  it("accepts typical account ids", () => {
    expect(isAccountId("u1")).toBe(true);
    expect(isAccountId("alice.testnet")).toBe(true);
    expect(isAccountId("token_receiver-2.near")).toBe(true);
  });

  it("enforces length bounds", () => {
    expect(isAccountId("a")).toBe(false);
    expect(isAccountId("a".repeat(64))).toBe(true);
    expect(isAccountId("a".repeat(65))).toBe(false);
  });

  it("rejects uppercase and dangling separators", () => {
    expect(isAccountId("Alice")).toBe(false);
    expect(isAccountId("-alice")).toBe(false);
    expect(isAccountId("alice.")).toBe(false);
    expect(isAccountId("al..ice")).toBe(false);
  });
});

describe("isTokenMetadata", () => {
  const valid = {
    spec: "ft-1.0.0",
    name: "Example Token",
    symbol: "EXT",
    icon: null,
    reference: null,
    referenceHash: null,
    decimals: 18,
  };

  it("accepts well-formed metadata", () => {
    expect(isTokenMetadata(valid)).toBe(true);
  });

  it("rejects missing decimals", () => {
    const { decimals: _decimals, ...rest } = valid;
    expect(isTokenMetadata(rest)).toBe(false);
  });

  it("rejects decimals outside a byte", () => {
    expect(isTokenMetadata({ ...valid, decimals: 256 })).toBe(false);
    expect(isTokenMetadata({ ...valid, decimals: 1.5 })).toBe(false);
  });

  it("accepts metadata without the optional fields", () => {
    expect(isTokenMetadata({ spec: "ft-1.0.0", name: "Bare", symbol: "BR", decimals: 6 })).toBe(
      true,
    );
  });

  it("rejects a non-string icon", () => {
    expect(isTokenMetadata({ ...valid, icon: 7 })).toBe(false);
  });
});

describe("isStorageBalance", () => {
  it("accepts decimal-string balances", () => {
    expect(isStorageBalance({ total: "890000000000000000000", available: "0" })).toBe(true);
  });

  it("rejects numeric balances", () => {
    expect(isStorageBalance({ total: 1, available: 0 })).toBe(false);
    expect(isStorageBalance(null)).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

const metadata = {
  eventId: "rcpt-1:0",
  timestamp: "2025-01-01T00:00:00.000Z",
  actor: "owner",
  correlationId: "rcpt-1",
  source: "ledger",
};

describe("isEventMetadata", () => {
  it("accepts valid metadata", () => {
    expect(isEventMetadata(metadata)).toBe(true);
  });

  it("rejects unknown source", () => {
    expect(isEventMetadata({ ...metadata, source: "vault" })).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts a valid event", () => {
    expect(isDomainEvent({ type: "ft_mint", metadata, payload: {} })).toBe(true);
  });

  it("rejects null payload", () => {
    expect(isDomainEvent({ type: "ft_mint", metadata, payload: null })).toBe(false);
  });
});
