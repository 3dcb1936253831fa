/**
 * Built-in transfer-call receiver for the HTTP service.
 *
 * The `msg` of the transfer-call tells the escrow how much to keep:
 *
 * - `""`: keep the whole amount
 * - `"refund"`: keep nothing
 * - `"<digits>"`: keep that many units (the ledger clamps it to the amount)
 *
 * Any other message fails the receiver call, which reverts the transfer.
 */

import type { Logger } from "pino";
import type { AccountId, U128String } from "@ft-ledger/types";
import { isU128String } from "@ft-ledger/types";
import type { TokenReceiver } from "@ft-ledger/host";

export const REFUND_MSG = "refund";

export class EscrowReceiver implements TokenReceiver {
  constructor(
    readonly accountId: AccountId,
    private readonly _logger?: Logger | undefined,
  ) {}

  ftOnTransfer(senderId: AccountId, amount: U128String, msg: string): U128String {
    const kept = this._keep(amount, msg);
    this._logger?.debug({ escrow: this.accountId, senderId, amount, kept }, "escrow received");
    return kept;
  }

  private _keep(amount: U128String, msg: string): U128String {
    if (msg === "") return amount;
    if (msg === REFUND_MSG) return "0";
    if (isU128String(msg)) return msg;
    throw new Error(`Escrow ${this.accountId} does not understand msg "${msg}"`);
  }
}
