/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Caller } from "@ft-ledger/host";
import type { TokenService } from "../services/token-service.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The token service behind every API route */
    service: TokenService;
  };
}

/**
 * Environment of a mutating route, after the caller middleware ran.
 */
export interface CallerEnv {
  Variables: {
    /** Account and deposit from the X-Account-Id / X-Attached-Deposit headers */
    caller: Caller;
  };
}
