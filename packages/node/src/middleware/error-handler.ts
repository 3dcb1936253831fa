/**
 * Error → HTTP mapping.
 *
 * Contract failures reach the client two ways: as failed call receipts
 * (which also carry the deposit refund) and as errors thrown from views.
 * Both go through the same status table and error envelope.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { TokenError } from "@ft-ledger/ledger";
import { HostError } from "@ft-ledger/host";
import { EventStoreError } from "@ft-ledger/event-store";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Malformed input
  INVALID_AMOUNT: 400,
  INVALID_ACCOUNT_ID: 400,
  INVALID_METADATA: 400,
  INVALID_DEPOSIT: 400,
  ZERO_AMOUNT: 400,
  INVALID_POSITION: 400,

  // Deposit too small for the call
  INSUFFICIENT_DEPOSIT: 402,

  PRIVATE_METHOD: 403,

  ACCOUNT_NOT_REGISTERED: 404,
  UNKNOWN_TRANSFER: 404,

  // State conflicts
  ALREADY_INITIALIZED: 409,
  NOT_INITIALIZED: 409,
  UNAUTHORIZED_UNREGISTER: 409,

  // Balance arithmetic
  INSUFFICIENT_BALANCE: 422,
  BELOW_MINIMUM_STORAGE_BALANCE: 422,
  OVERFLOW: 422,
};

/** HTTP status for a domain error code; unknown codes are server errors. */
export function statusForCode(code: string): ContentfulStatusCode {
  return STATUS_MAP[code] ?? 500;
}

function codeOf(err: Error): string | undefined {
  if (err instanceof TokenError || err instanceof HostError || err instanceof EventStoreError) {
    return err.code;
  }
  return undefined;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = codeOf(err);
  const status = code === undefined ? 500 : statusForCode(code);

  // 500s never leak the underlying message.
  if (status === 500) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }
  return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message), status);
}
