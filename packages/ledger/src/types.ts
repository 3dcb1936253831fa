/**
 * @ft-ledger/ledger — Internal types for the token contract.
 *
 * These extend the shared @ft-ledger/types with contract-specific
 * structures: call environment, payouts, pending transfers and errors.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are bigint inside the contract, decimal strings at its boundary
 * - Fail-closed: invalid input throws, never silently succeeds
 */

import type { AccountId, U128String } from "@ft-ledger/types";
import type { TokenEventPayloads, TokenEventType } from "@ft-ledger/event-store";

// ─── Call Environment ────────────────────────────────────────────────────

/**
 * What the host tells the contract about the call being executed.
 */
export interface CallEnv {
  /** Account the contract is deployed on */
  readonly currentAccountId: AccountId;

  /** Immediate caller (a user or another contract) */
  readonly predecessorAccountId: AccountId;

  /** Native-currency deposit attached to the call */
  readonly attachedDeposit: bigint;

  /** Host-assigned identifier of this call */
  readonly receiptId: string;
}

/**
 * Host-level money returned to an account when a call commits.
 */
export interface Payout {
  readonly receiverId: AccountId;
  readonly amount: bigint;
  readonly reason: PayoutReason;
}

export type PayoutReason =
  | "deposit_refund"
  | "storage_release";

// ─── Events ──────────────────────────────────────────────────────────────

/**
 * A token event recorded during a call, before the host commits it.
 */
export interface TokenEventRecord<K extends TokenEventType = TokenEventType> {
  readonly type: K;
  readonly standard: string;
  readonly payload: TokenEventPayloads[K];
}

// ─── Cross-contract transfer ─────────────────────────────────────────────

/**
 * Lifecycle of a transfer-call:
 *
 *   Initiated → AwaitingCallback → Settled | Reverted
 *
 * Only the first two are ever stored; a terminal state deletes the record.
 */
export type TransferState = "Initiated" | "AwaitingCallback" | "Settled" | "Reverted";

/**
 * A transfer-call between its two phases.
 */
export interface PendingTransfer {
  readonly id: string;
  readonly senderId: AccountId;
  readonly receiverId: AccountId;
  readonly amount: bigint;
  readonly memo: string | undefined;
  readonly state: TransferState;
}

/**
 * Result of the receiver's `ft_on_transfer`, as seen by the resolution.
 */
export type ReceiverOutcome =
  | { readonly status: "success"; readonly value: string }
  | { readonly status: "failure"; readonly error: string };

/**
 * Continuation scheduled by Phase 1: call the receiver, then resolve on
 * the contract with the receiver's outcome.
 */
export interface TransferCallPromise {
  readonly transferId: string;
  readonly receiverId: AccountId;
  readonly senderId: AccountId;
  readonly amount: U128String;
  readonly msg: string;
}

/**
 * Final accounting of a resolved transfer-call.
 */
export interface TransferSettlement {
  readonly transferId: string;
  readonly state: "Settled" | "Reverted";
  readonly used: bigint;
  readonly refunded: bigint;
  readonly burned: bigint;
}

// ─── Call Outcome ────────────────────────────────────────────────────────

/**
 * Everything a mutating entry point produced. The host commits all of it
 * together, or none of it.
 */
export interface CallOutcome<T> {
  readonly value: T;
  readonly payouts: readonly Payout[];
  readonly logs: readonly string[];
  readonly events: readonly TokenEventRecord[];
  readonly promises: readonly TransferCallPromise[];
}

/**
 * Result of `storage_withdraw`.
 */
export interface StorageWithdrawal {
  readonly withdrawn: U128String;
  readonly total: U128String;
  readonly available: U128String;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for token contract operations. */
export type TokenErrorCode =
  | "ALREADY_INITIALIZED"
  | "NOT_INITIALIZED"
  | "INVALID_METADATA"
  | "INSUFFICIENT_DEPOSIT"
  | "ACCOUNT_NOT_REGISTERED"
  | "INSUFFICIENT_BALANCE"
  | "ZERO_AMOUNT"
  | "OVERFLOW"
  | "UNAUTHORIZED_UNREGISTER"
  | "BELOW_MINIMUM_STORAGE_BALANCE"
  | "INVALID_AMOUNT"
  | "INVALID_ACCOUNT_ID"
  | "UNKNOWN_TRANSFER"
  | "PRIVATE_METHOD";

/**
 * Structured error from the token contract.
 * Always thrown — the host turns it into a failed call and rolls back.
 */
export class TokenError extends Error {
  public readonly code: TokenErrorCode;

  constructor(code: TokenErrorCode, message: string) {
    super(message);
    this.name = "TokenError";
    this.code = code;
  }
}
