/**
 * Call receipt → HTTP response.
 *
 * Success: 200 { data: { value, payouts, logs } }
 * Failure: mapped status with the error envelope; the refunded deposit is
 * reported under details.payouts.
 */

import type { Context } from "hono";
import type { CallReceipt } from "@ft-ledger/host";
import { toPayoutDto } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { statusForCode } from "../middleware/error-handler.js";

export function receiptResponse<T>(c: Context, receipt: CallReceipt<T>): Response {
  const payouts = receipt.payouts.map(toPayoutDto);

  if (receipt.status === "failure") {
    return c.json(
      createErrorEnvelope(receipt.error.code, receipt.error.message, { payouts }),
      statusForCode(receipt.error.code),
    );
  }

  return c.json({
    data: {
      receiptId: receipt.receiptId,
      value: receipt.value,
      payouts,
      logs: receipt.logs,
    },
  });
}
