/**
 * Storage management routes.
 *
 * GET  /api/v1/storage/bounds               — Minimum and maximum storage balance
 * GET  /api/v1/storage/balances/:accountId  — Storage balance, or null if unregistered
 * POST /api/v1/storage/deposit              — Register an account against a deposit
 * POST /api/v1/storage/withdraw             — Withdraw available storage balance
 * POST /api/v1/storage/unregister           — Close the caller's account
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  StorageDepositSchema,
  StorageUnregisterSchema,
  StorageWithdrawSchema,
} from "../types/dto.js";
import { callerMiddleware } from "../middleware/caller.js";
import { validateBody } from "../middleware/validate.js";
import { receiptResponse } from "./receipt.js";

export function createStorageRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/bounds", (c) => {
    return c.json({ data: c.get("service").storageBalanceBounds() });
  });

  routes.get("/balances/:accountId", (c) => {
    return c.json({ data: c.get("service").storageBalanceOf(c.req.param("accountId")) });
  });

  routes.post("/deposit", callerMiddleware(), validateBody(StorageDepositSchema), (c) => {
    const receipt = c.get("service").storageDeposit(c.get("caller"), c.get("validatedBody"));
    return receiptResponse(c, receipt);
  });

  routes.post("/withdraw", callerMiddleware(), validateBody(StorageWithdrawSchema), (c) => {
    const receipt = c.get("service").storageWithdraw(c.get("caller"), c.get("validatedBody"));
    return receiptResponse(c, receipt);
  });

  routes.post("/unregister", callerMiddleware(), validateBody(StorageUnregisterSchema), (c) => {
    const receipt = c.get("service").storageUnregister(c.get("caller"), c.get("validatedBody"));
    return receiptResponse(c, receipt);
  });

  return routes;
}
