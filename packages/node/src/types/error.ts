/**
 * Error envelope types for API responses.
 *
 * Every error response has the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 *
 * Codes are either the contract's TokenError codes or one of the
 * HTTP-level codes below.
 */

import type { TokenErrorCode } from "@ft-ledger/ledger";

// =============================================================================
// Error Codes
// =============================================================================

export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "INTERNAL_ERROR";

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode | TokenErrorCode | string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ErrorDetail["code"],
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return details === undefined
    ? { error: { code, message } }
    : { error: { code, message, details } };
}
