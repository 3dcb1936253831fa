/**
 * @ft-ledger/ledger — Pending transfer book.
 *
 * Holds transfer-calls between Phase 1 and their resolution. The book is
 * a host-carried continuation, not metered storage: it is checkpointed and
 * restored together with storage but never charged rent.
 *
 * Each record is resolved exactly once; `take` removes it.
 */

import type { AccountId } from "@ft-ledger/types";
import type { PendingTransfer } from "./types.js";
import { TokenError } from "./types.js";

export interface OpenTransfer {
  readonly id: string;
  readonly senderId: AccountId;
  readonly receiverId: AccountId;
  readonly amount: bigint;
  readonly memo: string | undefined;
}

export type PendingCheckpoint = ReadonlyMap<string, PendingTransfer>;

export class PendingBook {
  private _transfers = new Map<string, PendingTransfer>();

  open(transfer: OpenTransfer): PendingTransfer {
    if (this._transfers.has(transfer.id)) {
      throw new TokenError("UNKNOWN_TRANSFER", `Transfer ${transfer.id} is already pending`);
    }
    const pending: PendingTransfer = { ...transfer, state: "Initiated" };
    this._transfers.set(transfer.id, pending);
    return pending;
  }

  /**
   * Move a transfer to AwaitingCallback once its promise is scheduled.
   */
  markAwaiting(id: string): PendingTransfer {
    const pending = this._require(id);
    const next: PendingTransfer = { ...pending, state: "AwaitingCallback" };
    this._transfers.set(id, next);
    return next;
  }

  get(id: string): PendingTransfer | undefined {
    return this._transfers.get(id);
  }

  /**
   * Remove and return a transfer awaiting resolution.
   */
  take(id: string): PendingTransfer {
    const pending = this._require(id);
    this._transfers.delete(id);
    return pending;
  }

  list(): readonly PendingTransfer[] {
    return [...this._transfers.values()];
  }

  get size(): number {
    return this._transfers.size;
  }

  checkpoint(): PendingCheckpoint {
    return new Map(this._transfers);
  }

  restore(checkpoint: PendingCheckpoint): void {
    this._transfers = new Map(checkpoint);
  }

  private _require(id: string): PendingTransfer {
    const pending = this._transfers.get(id);
    if (pending === undefined) {
      throw new TokenError("UNKNOWN_TRANSFER", `No pending transfer with id ${id}`);
    }
    return pending;
  }
}
