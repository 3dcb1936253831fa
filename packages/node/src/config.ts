/**
 * @ft-ledger/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isAccountId, isU128String } from "@ft-ledger/types";
import type { TokenServiceConfig } from "./services/token-service.js";

// =============================================================================
// Schema
// =============================================================================

const AccountIdVar = z.string().refine(isAccountId, { message: "must be a valid account id" });

const U128Var = z
  .string()
  .refine(isU128String, { message: "must be a base-10 integer in [0, 2^128 - 1]" });

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Contract
  CONTRACT_ID: AccountIdVar.default("token.local"),
  OWNER_ID: AccountIdVar.default("owner.local"),
  TOTAL_SUPPLY: U128Var.default("1000000000000000000000000000"),
  STORAGE_BYTE_COST: U128Var.default("10000000000000000000"),

  // Built-in transfer-call receiver; "none" disables it
  ESCROW_ID: z
    .union([z.literal("none"), AccountIdVar])
    .default("escrow.local"),

  // Metadata
  TOKEN_NAME: z.string().min(1).default("Fungible Token"),
  TOKEN_SYMBOL: z.string().min(1).default("FT"),
  TOKEN_DECIMALS: z.coerce.number().int().min(0).max(255).default(18),
  TOKEN_ICON: z.string().optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * The contract part of the configuration, in the shape TokenService takes.
 */
export function toServiceConfig(config: AppConfig): TokenServiceConfig {
  return {
    contractId: config.CONTRACT_ID,
    ownerId: config.OWNER_ID,
    totalSupply: config.TOTAL_SUPPLY,
    storageByteCost: BigInt(config.STORAGE_BYTE_COST),
    escrowId: config.ESCROW_ID === "none" ? undefined : config.ESCROW_ID,
    token: {
      name: config.TOKEN_NAME,
      symbol: config.TOKEN_SYMBOL,
      decimals: config.TOKEN_DECIMALS,
      icon: config.TOKEN_ICON ?? null,
    },
  };
}
