/**
 * @ft-ledger/ledger — Unsigned 128-bit arithmetic.
 *
 * All arithmetic uses bigint; this module keeps every value inside
 * [0, 2^128 − 1] and converts between bigint, decimal strings and the
 * little-endian byte layout used in contract storage.
 *
 * Rules:
 * - No floating-point operations
 * - Overflow and underflow throw, never wrap
 * - Decimal strings are plain base-10 digits (no sign, no fraction)
 */

import { U128_MAX } from "@ft-ledger/types";
import { TokenError } from "./types.js";

export { U128_MAX };

export const U64_MAX = (1n << 64n) - 1n;

// ─── Decimal strings ─────────────────────────────────────────────────────

/**
 * Parse a base-10 string into a u128.
 *
 * "100" → 100n
 * "0007" → 7n
 * "-1", "1.5", "" → INVALID_AMOUNT
 */
export function parseU128(amount: string, field = "amount"): bigint {
  if (typeof amount !== "string" || !/^\d+$/.test(amount)) {
    throw new TokenError(
      "INVALID_AMOUNT",
      `Invalid ${field}: "${String(amount)}" is not a base-10 unsigned integer`,
    );
  }
  const value = BigInt(amount);
  if (value > U128_MAX) {
    throw new TokenError("INVALID_AMOUNT", `Invalid ${field}: "${amount}" exceeds 2^128 - 1`);
  }
  return value;
}

/**
 * Lenient parse used for values reported by other contracts.
 * Returns undefined instead of throwing.
 */
export function tryParseU128(amount: unknown): bigint | undefined {
  if (typeof amount !== "string" || !/^\d+$/.test(amount)) return undefined;
  const value = BigInt(amount);
  return value <= U128_MAX ? value : undefined;
}

export function formatU128(value: bigint): string {
  return value.toString();
}

// ─── Checked arithmetic ──────────────────────────────────────────────────

export function checkedAdd(a: bigint, b: bigint): bigint {
  const sum = a + b;
  if (sum > U128_MAX) {
    throw new TokenError("OVERFLOW", "Addition overflow");
  }
  return sum;
}

export function checkedSub(a: bigint, b: bigint): bigint {
  if (b > a) {
    throw new TokenError("INSUFFICIENT_BALANCE", "The account doesn't have enough balance");
  }
  return a - b;
}

export function minU128(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

// ─── Little-endian codec ─────────────────────────────────────────────────

function encodeLE(value: bigint, width: number, max: bigint): Uint8Array {
  if (value < 0n || value > max) {
    throw new RangeError(`Value ${value.toString()} does not fit in ${String(width * 8)} bits`);
  }
  const out = new Uint8Array(width);
  let rest = value;
  for (let i = 0; i < width; i++) {
    out[i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return out;
}

function decodeLE(bytes: Uint8Array, width: number): bigint {
  if (bytes.length !== width) {
    throw new RangeError(`Expected ${String(width)} bytes, got ${String(bytes.length)}`);
  }
  let value = 0n;
  for (let i = width - 1; i >= 0; i--) {
    value = (value << 8n) | BigInt(bytes[i] ?? 0);
  }
  return value;
}

/** 16-byte little-endian encoding of a u128. */
export function encodeU128(value: bigint): Uint8Array {
  return encodeLE(value, 16, U128_MAX);
}

export function decodeU128(bytes: Uint8Array): bigint {
  return decodeLE(bytes, 16);
}

/** 8-byte little-endian encoding of a u64. */
export function encodeU64(value: bigint): Uint8Array {
  return encodeLE(value, 8, U64_MAX);
}

export function decodeU64(bytes: Uint8Array): bigint {
  return decodeLE(bytes, 8);
}
