/**
 * Shared response helpers for ledger routes.
 *
 * Successful results are wrapped as { data }; failed results become the
 * standard error envelope with the status their code maps to.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { LedgerFailure, LedgerResult } from "@mintline/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import { statusForCode } from "../middleware/error-handler.js";

export function sendFailure<E extends AppEnv>(c: Context<E>, failure: LedgerFailure): Response {
  return c.json(createErrorEnvelope(failure.code, failure.message), statusForCode(failure.code));
}

export function sendResult<E extends AppEnv, T, D extends object>(
  c: Context<E>,
  result: LedgerResult<T>,
  toData: (value: T) => D,
  status: ContentfulStatusCode = 200,
): Response {
  if (!result.ok) {
    return sendFailure(c, result.error);
  }
  return c.json({ data: toData(result.value) }, status);
}
