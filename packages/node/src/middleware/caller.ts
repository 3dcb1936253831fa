/**
 * Caller middleware.
 *
 * Mutating routes act on behalf of the account named in X-Account-Id,
 * with the native-currency deposit given in X-Attached-Deposit
 * (a base-10 string, default "0").
 */

import type { MiddlewareHandler } from "hono";
import type { CallerEnv } from "../types/api-contract.js";
import { CallerHeadersSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "./validate.js";

export function callerMiddleware(): MiddlewareHandler<CallerEnv> {
  return async (c, next) => {
    const result = CallerHeadersSchema.safeParse(c.req.header());
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid caller headers", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }

    c.set("caller", {
      predecessorAccountId: result.data["x-account-id"],
      attachedDeposit: BigInt(result.data["x-attached-deposit"]),
    });
    return next();
  };
}
