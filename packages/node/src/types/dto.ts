/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body, query and header validation.
 * Amounts cross the wire as base-10 strings.
 */

import { z } from "zod";
import { isAccountId, isU128String } from "@ft-ledger/types";
import type { Payout } from "@ft-ledger/ledger";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AccountIdSchema = z
  .string()
  .refine(isAccountId, { message: "must be a valid account id" });

export const U128StringSchema = z
  .string()
  .refine(isU128String, { message: "must be a base-10 integer in [0, 2^128 - 1]" });

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Caller Headers
// =============================================================================

export const ACCOUNT_ID_HEADER = "X-Account-Id";
export const ATTACHED_DEPOSIT_HEADER = "X-Attached-Deposit";

/** Header names arrive lowercased from `c.req.header()`. */
export const CallerHeadersSchema = z.object({
  "x-account-id": AccountIdSchema,
  "x-attached-deposit": U128StringSchema.default("0"),
});

// =============================================================================
// Fungible Token DTOs
// =============================================================================

export const FtTransferSchema = z.object({
  receiverId: AccountIdSchema,
  amount: U128StringSchema,
  memo: z.string().max(256).optional(),
});

export type FtTransferDto = z.infer<typeof FtTransferSchema>;

export const FtTransferCallSchema = FtTransferSchema.extend({
  msg: z.string().default(""),
});

export type FtTransferCallDto = z.infer<typeof FtTransferCallSchema>;

// =============================================================================
// Storage DTOs
// =============================================================================

export const StorageDepositSchema = z.object({
  accountId: AccountIdSchema.optional(),
  registrationOnly: z.boolean().optional(),
});

export type StorageDepositDto = z.infer<typeof StorageDepositSchema>;

export const StorageWithdrawSchema = z.object({
  amount: U128StringSchema.optional(),
});

export type StorageWithdrawDto = z.infer<typeof StorageWithdrawSchema>;

export const StorageUnregisterSchema = z.object({
  force: z.boolean().optional(),
});

export type StorageUnregisterDto = z.infer<typeof StorageUnregisterSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;

// =============================================================================
// Responses
// =============================================================================

export interface PayoutDto {
  readonly receiverId: string;
  readonly amount: string;
  readonly reason: Payout["reason"];
}

export function toPayoutDto(payout: Payout): PayoutDto {
  return {
    receiverId: payout.receiverId,
    amount: payout.amount.toString(),
    reason: payout.reason,
  };
}
