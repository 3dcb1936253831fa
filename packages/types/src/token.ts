/**
 * Token Types
 *
 * Core primitives of a single-asset fungible-token ledger.
 *
 * Rules:
 * - All amounts cross package boundaries as base-10 strings (u128 safe)
 * - Account identifiers are plain strings validated by `isAccountId`
 * - Metadata is immutable once the contract is initialized
 */

/**
 * Account identifier (e.g. "alice.testnet", "u1").
 * 2–64 characters of lowercase alphanumerics separated by `-`, `_` or `.`.
 */
export type AccountId = string;

/**
 * Unsigned 128-bit integer encoded as a base-10 string ("0" … "340282366920938463463374607431768211455").
 * Host encodings cannot represent 128-bit integers natively, so every amount travels as text.
 */
export type U128String = string;

/**
 * Immutable token descriptor.
 */
export interface TokenMetadata {
  /** Metadata format version, always "ft-1.0.0" */
  readonly spec: string;

  /** Human-readable token name */
  readonly name: string;

  /** Ticker symbol */
  readonly symbol: string;

  /** Data URL of the token icon */
  readonly icon?: string | null;

  /** Link to an off-chain JSON document with more details */
  readonly reference?: string | null;

  /** Base64 SHA-256 of the referenced document */
  readonly referenceHash?: string | null;

  /** Number of decimal places used to display balances */
  readonly decimals: number;
}

/**
 * Storage deposit held for an account.
 */
export interface StorageBalance {
  /** Total deposit locked for the account */
  readonly total: U128String;

  /** Portion of the deposit not backing any stored bytes */
  readonly available: U128String;
}

/**
 * Deposit bounds for account registration.
 * `max` is null: an account never needs more than one entry's worth.
 */
export interface StorageBalanceBounds {
  readonly min: U128String;
  readonly max: U128String | null;
}
