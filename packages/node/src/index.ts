/**
 * @ft-ledger/node — HTTP service for the fungible token contract.
 *
 * @packageDocumentation
 */

export { TokenService } from "./services/token-service.js";
export type { TokenServiceConfig } from "./services/token-service.js";
export { EscrowReceiver, REFUND_MSG } from "./services/escrow-receiver.js";
export { loadConfig, toServiceConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
