/**
 * Zod validation middleware for request bodies and query strings.
 *
 * Both return 400 VALIDATION_ERROR with per-issue details on failure.
 */

import type { MiddlewareHandler } from "hono";
import type { ZodError, ZodTypeAny, output } from "zod";
import type { AppEnv, ValidatedEnv, ValidatedQueryEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export function formatZodErrors(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

function invalid(message: string, error: ZodError) {
  return createErrorEnvelope("VALIDATION_ERROR", message, {
    issues: formatZodErrors(error),
  });
}

/**
 * Parse the JSON body with `schema` and expose it as `validatedBody`.
 */
export function validateBody<S extends ZodTypeAny>(
  schema: S,
): MiddlewareHandler<AppEnv & ValidatedEnv<output<S>>> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
        400,
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(invalid("Request body validation failed", result.error), 400);
    }

    c.set("validatedBody", result.data);
    return next();
  };
}

/**
 * Parse the query string with `schema` and expose it as `validatedQuery`.
 * Repeated keys keep their first value.
 */
export function validateQuery<S extends ZodTypeAny>(
  schema: S,
): MiddlewareHandler<AppEnv & ValidatedQueryEnv<output<S>>> {
  return async (c, next) => {
    const result = schema.safeParse(c.req.query());
    if (!result.success) {
      return c.json(invalid("Invalid query parameters", result.error), 400);
    }

    c.set("validatedQuery", result.data);
    return next();
  };
}
