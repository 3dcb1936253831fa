/**
 * @ft-ledger/ledger — Ledger / Transfer Engine.
 *
 * Balance mapping and total supply of a single fungible asset.
 *
 * API surface:
 * - mint() — Credit new tokens (initialization only)
 * - transfer() — Move tokens between two registered accounts
 * - openTransferCall() — Phase 1 of a transfer-call
 * - resolveTransferCall() — Phase 2: settle with the receiver's outcome
 * - totalSupply() / balanceOf() — Pure reads
 *
 * Invariant: the sum of all balances equals total supply after every
 * committed call.
 */

import type { AccountId } from "@ft-ledger/types";
import type { AccountRegistry } from "./accounts.js";
import type { EventEmitter } from "./events.js";
import type { PendingBook } from "./pending.js";
import type { RootStore } from "./state.js";
import type { PendingTransfer, ReceiverOutcome, TransferSettlement } from "./types.js";
import { TokenError } from "./types.js";
import { checkedAdd, checkedSub, formatU128, minU128, tryParseU128 } from "./u128.js";

export const REFUND_MEMO = "refund";

/**
 * Memo only when present, so event payloads never carry undefined keys.
 */
function withMemo<T extends object>(
  payload: T,
  memo: string | undefined,
): T | (T & { memo: string }) {
  return memo === undefined ? payload : { ...payload, memo };
}

/**
 * Interpret the receiver's report of how much it kept.
 * Failures and unparseable values count as 0; the result is clamped to `amount`.
 */
export function usedAmount(outcome: ReceiverOutcome, amount: bigint): bigint {
  if (outcome.status === "failure") return 0n;
  const used = tryParseU128(outcome.value);
  if (used === undefined) return 0n;
  return minU128(used, amount);
}

export class TokenLedger {
  constructor(
    private readonly _root: RootStore,
    private readonly _accounts: AccountRegistry,
    private readonly _pending: PendingBook,
    private readonly _emitter: EventEmitter,
  ) {}

  // ─── Reads ───────────────────────────────────────────────────────────

  totalSupply(): bigint {
    return this._root.load().totalSupply;
  }

  /** Unregistered accounts read as 0. */
  balanceOf(accountId: AccountId): bigint {
    return this._accounts.balanceOf(accountId) ?? 0n;
  }

  // ─── Internal balance moves ──────────────────────────────────────────

  private _deposit(accountId: AccountId, amount: bigint): void {
    const balance = this._accounts.assertRegistered(accountId);
    this._accounts.setBalance(accountId, checkedAdd(balance, amount));
  }

  private _withdraw(accountId: AccountId, amount: bigint): void {
    const balance = this._accounts.assertRegistered(accountId);
    this._accounts.setBalance(accountId, checkedSub(balance, amount));
  }

  private _move(senderId: AccountId, receiverId: AccountId, amount: bigint): void {
    if (senderId === receiverId) {
      throw new TokenError("ACCOUNT_NOT_REGISTERED", "Sender and receiver should be different");
    }
    if (amount === 0n) {
      throw new TokenError("ZERO_AMOUNT", "The amount should be a positive number");
    }
    this._accounts.assertRegistered(receiverId);
    this._withdraw(senderId, amount);
    this._deposit(receiverId, amount);
  }

  // ─── Mint ────────────────────────────────────────────────────────────

  /**
   * Credit new tokens to a registered account and grow total supply.
   */
  mint(accountId: AccountId, amount: bigint, memo?: string): void {
    const supply = checkedAdd(this.totalSupply(), amount);
    this._deposit(accountId, amount);
    this._root.setTotalSupply(supply);
    this._emitter.emit("ft_mint", withMemo({ owner_id: accountId, amount: formatU128(amount) }, memo));
  }

  // ─── Transfer ────────────────────────────────────────────────────────

  transfer(senderId: AccountId, receiverId: AccountId, amount: bigint, memo?: string): void {
    this._move(senderId, receiverId, amount);
    this._emitter.emit(
      "ft_transfer",
      withMemo(
        { old_owner_id: senderId, new_owner_id: receiverId, amount: formatU128(amount) },
        memo,
      ),
    );
    if (memo !== undefined) {
      this._emitter.log(`Memo: ${memo}`);
    }
  }

  // ─── Transfer-call ───────────────────────────────────────────────────

  /**
   * Phase 1: move the tokens optimistically and record the pending transfer.
   */
  openTransferCall(
    transferId: string,
    senderId: AccountId,
    receiverId: AccountId,
    amount: bigint,
    memo?: string,
  ): PendingTransfer {
    this.transfer(senderId, receiverId, amount, memo);
    this._pending.open({ id: transferId, senderId, receiverId, amount, memo });
    return this._pending.markAwaiting(transferId);
  }

  /**
   * Phase 2: take back whatever the receiver did not use, as far as the
   * receiver still holds it. The refund goes to the sender, or is burned
   * if the sender unregistered in the meantime. Burned tokens never reach
   * the sender, so they count as used.
   */
  resolveTransferCall(transferId: string, outcome: ReceiverOutcome): TransferSettlement {
    const pending = this._pending.take(transferId);
    const { senderId, receiverId, amount } = pending;

    const unused = amount - usedAmount(outcome, amount);
    let refunded = 0n;
    let burned = 0n;

    if (unused > 0n) {
      const receiverBalance = this.balanceOf(receiverId);
      if (receiverBalance > 0n) {
        const refund = minU128(unused, receiverBalance);
        this._accounts.setBalance(receiverId, receiverBalance - refund);

        if (this._accounts.isRegistered(senderId)) {
          this._deposit(senderId, refund);
          refunded = refund;
          this._emitter.emit("ft_transfer", {
            old_owner_id: receiverId,
            new_owner_id: senderId,
            amount: formatU128(refund),
            memo: REFUND_MEMO,
          });
        } else {
          this._root.setTotalSupply(this.totalSupply() - refund);
          burned = refund;
          this._emitter.log(`Account @${senderId} burned ${formatU128(refund)}`);
          this._emitter.emit("ft_burn", {
            owner_id: receiverId,
            amount: formatU128(refund),
            memo: REFUND_MEMO,
          });
        }
      }
    }

    const used = amount - refunded;
    this._emitter.emit("ft_transfer_settled", {
      transfer_id: transferId,
      sender_id: senderId,
      receiver_id: receiverId,
      amount: formatU128(amount),
      used: formatU128(used),
      refunded: formatU128(refunded),
      burned: formatU128(burned),
    });

    return {
      transferId,
      state: used === 0n ? "Reverted" : "Settled",
      used,
      refunded,
      burned,
    };
  }
}
