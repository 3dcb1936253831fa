/**
 * @ft-ledger/ledger — Storage Accounting Guard.
 *
 * Brackets a mutating operation, measures the storage byte delta and turns
 * it into a required deposit or a refund:
 *
 *   delta > 0  → attached deposit must cover delta × byte cost; excess refunded
 *   delta ≤ 0  → attached deposit and the released cost are refunded
 *
 * A failure here throws after `op` has mutated storage; the caller's
 * checkpoint is what undoes those mutations.
 */

import type { MeteredStorage } from "./storage.js";
import type { CallEnv, Payout } from "./types.js";
import { TokenError } from "./types.js";

export interface GuardedResult<T> {
  readonly value: T;
  readonly payouts: readonly Payout[];
}

export function withStorageAccounting<T>(
  storage: MeteredStorage,
  storageByteCost: bigint,
  env: CallEnv,
  op: () => T,
): GuardedResult<T> {
  const before = storage.usage;
  const value = op();
  const after = storage.usage;

  const payouts: Payout[] = [];
  const refund = (amount: bigint, reason: Payout["reason"]): void => {
    if (amount > 0n) {
      payouts.push({ receiverId: env.predecessorAccountId, amount, reason });
    }
  };

  if (after > before) {
    const required = BigInt(after - before) * storageByteCost;
    if (env.attachedDeposit < required) {
      throw new TokenError(
        "INSUFFICIENT_DEPOSIT",
        `Must attach ${required.toString()} to cover storage`,
      );
    }
    refund(env.attachedDeposit - required, "deposit_refund");
  } else {
    refund(env.attachedDeposit, "deposit_refund");
    refund(BigInt(before - after) * storageByteCost, "storage_release");
  }

  return { value, payouts };
}

/**
 * Entry points that move funds require at least one attached unit so
 * that only a full-access caller can invoke them.
 */
export function assertOneUnit(env: CallEnv): void {
  if (env.attachedDeposit < 1n) {
    throw new TokenError(
      "INSUFFICIENT_DEPOSIT",
      "Requires attached deposit of at least 1 unit",
    );
  }
}
