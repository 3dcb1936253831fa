/**
 * Fungible token routes.
 *
 * GET  /api/v1/ft/metadata             — Token metadata
 * GET  /api/v1/ft/total-supply         — Total supply
 * GET  /api/v1/ft/balances/:accountId  — Balance of an account ("0" if unregistered)
 * POST /api/v1/ft/transfer             — Transfer to a registered account
 * POST /api/v1/ft/transfer-call        — Transfer and notify the receiver contract
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { FtTransferCallSchema, FtTransferSchema } from "../types/dto.js";
import { callerMiddleware } from "../middleware/caller.js";
import { validateBody } from "../middleware/validate.js";
import { receiptResponse } from "./receipt.js";

export function createFtRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/metadata", (c) => {
    return c.json({ data: c.get("service").metadata() });
  });

  routes.get("/total-supply", (c) => {
    return c.json({ data: { totalSupply: c.get("service").totalSupply() } });
  });

  routes.get("/balances/:accountId", (c) => {
    const accountId = c.req.param("accountId");
    const balance = c.get("service").balanceOf(accountId);
    return c.json({ data: { accountId, balance } });
  });

  routes.post("/transfer", callerMiddleware(), validateBody(FtTransferSchema), (c) => {
    const receipt = c.get("service").transfer(c.get("caller"), c.get("validatedBody"));
    return receiptResponse(c, receipt);
  });

  // Resolves only after the receiver answered and the transfer settled.
  routes.post(
    "/transfer-call",
    callerMiddleware(),
    validateBody(FtTransferCallSchema),
    async (c) => {
      const receipt = await c
        .get("service")
        .transferCall(c.get("caller"), c.get("validatedBody"));
      return receiptResponse(c, receipt);
    },
  );

  return routes;
}
