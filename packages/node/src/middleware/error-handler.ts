/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Ledger error codes map to HTTP status codes; anything unknown
 * (journal write failures, bugs) becomes a generic 500.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { LedgerErrorCode } from "@mintline/ledger";
import { createErrorEnvelope } from "../types/error.js";
import type { ApiErrorCode } from "../types/error.js";

// =============================================================================
// Error Code → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Partial<Record<ApiErrorCode | LedgerErrorCode, ContentfulStatusCode>> = {
  VALIDATION_ERROR: 400,
  INVALID_AMOUNT: 400,
  INVALID_PRINCIPAL: 400,
  SAME_ACCOUNT: 400,
  UNAUTHENTICATED: 401,
  UNAUTHORIZED: 403,
  NOT_FOUND: 404,
  INSUFFICIENT_BALANCE: 422,
  OVERFLOW: 422,
};

const KNOWN_CODES = new Set<string>([
  "VALIDATION_ERROR",
  "UNAUTHENTICATED",
  "NOT_FOUND",
  "INTERNAL_ERROR",
  "UNAUTHORIZED",
  "INVALID_AMOUNT",
  "INSUFFICIENT_BALANCE",
  "OVERFLOW",
  "SAME_ACCOUNT",
  "INVALID_PRINCIPAL",
  "INVALID_CONFIG",
  "INVALID_SNAPSHOT",
  "JOURNAL_MISMATCH",
]);

function isKnownCode(code: string): code is ApiErrorCode | LedgerErrorCode {
  return KNOWN_CODES.has(code);
}

/**
 * HTTP status for an error code. Unmapped codes are 500.
 */
export function statusForCode(code: ApiErrorCode | LedgerErrorCode): ContentfulStatusCode {
  return STATUS_MAP[code] ?? 500;
}

function errorCodeOf(err: Error): ApiErrorCode | LedgerErrorCode {
  if ("code" in err && typeof err.code === "string" && isKnownCode(err.code)) {
    return err.code;
  }
  return "INTERNAL_ERROR";
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = errorCodeOf(err);
  const status = statusForCode(code);

  // Don't leak internal details
  if (status === 500) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }
  return c.json(createErrorEnvelope(code, err.message), status);
}
