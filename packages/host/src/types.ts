/**
 * @ft-ledger/host — Types for the local execution host.
 */

import type { AccountId, DomainEvent, StorageBalance, U128String } from "@ft-ledger/types";
import type {
  FtResolveTransferArgs,
  FtTransferArgs,
  FtTransferCallArgs,
  InitializeArgs,
  InitializeDefaultArgs,
  Payout,
  StorageDepositArgs,
  StorageUnregisterArgs,
  StorageWithdrawArgs,
  StorageWithdrawal,
  TokenError,
} from "@ft-ledger/ledger";

// ─── Method map ──────────────────────────────────────────────────────────

/** Arguments of every mutating entry point, by wire name. */
export interface MethodArgs {
  initialize: InitializeArgs;
  initialize_default: InitializeDefaultArgs;
  ft_transfer: FtTransferArgs;
  ft_transfer_call: FtTransferCallArgs;
  ft_resolve_transfer: FtResolveTransferArgs;
  storage_deposit: StorageDepositArgs;
  storage_withdraw: StorageWithdrawArgs;
  storage_unregister: StorageUnregisterArgs;
}

/** Return value of every mutating entry point, by wire name. */
export interface MethodResults {
  initialize: null;
  initialize_default: null;
  ft_transfer: null;
  ft_transfer_call: string;
  ft_resolve_transfer: U128String;
  storage_deposit: StorageBalance;
  storage_withdraw: StorageWithdrawal;
  storage_unregister: boolean;
}

export type MethodName = keyof MethodArgs;

// ─── Calls ───────────────────────────────────────────────────────────────

/** Who is calling, and with how much native currency attached. */
export interface Caller {
  readonly predecessorAccountId: AccountId;
  readonly attachedDeposit?: bigint | undefined;
}

/**
 * Result of one call. A committed call carries everything the contract
 * produced; a failed one carries only the refund of the attached deposit.
 */
export type CallReceipt<T> =
  | {
      readonly status: "success";
      readonly receiptId: string;
      readonly method: MethodName;
      readonly value: T;
      readonly payouts: readonly Payout[];
      readonly logs: readonly string[];
      readonly events: readonly DomainEvent[];
    }
  | {
      readonly status: "failure";
      readonly receiptId: string;
      readonly method: MethodName;
      readonly error: TokenError;
      readonly payouts: readonly Payout[];
    };

// ─── Receivers ───────────────────────────────────────────────────────────

/**
 * A contract account able to accept transfer-calls.
 * Returns the amount it used, as a decimal string.
 */
export interface TokenReceiver {
  ftOnTransfer(senderId: AccountId, amount: U128String, msg: string): string | Promise<string>;
}

/**
 * Outcome of one drained transfer-call continuation.
 */
export interface ResolvedTransfer {
  readonly transferId: string;
  readonly receiverId: AccountId;
  readonly receipt: CallReceipt<U128String>;
}

// ─── Logging ─────────────────────────────────────────────────────────────

export interface CallLogEntry {
  readonly receiptId: string;
  readonly method: MethodName;
  readonly predecessorAccountId: AccountId;
  readonly status: "success" | "failure";
  readonly errorCode?: string | undefined;
  readonly events: number;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type HostErrorCode =
  | "INVALID_DEPOSIT"
  | "RECEIVER_EXISTS"
  | "UNRESOLVED_TRANSFER";

/**
 * Misuse of the host itself. Contract failures never surface as HostError;
 * they become failed receipts.
 */
export class HostError extends Error {
  public readonly code: HostErrorCode;

  constructor(code: HostErrorCode, message: string) {
    super(message);
    this.name = "HostError";
    this.code = code;
  }
}
