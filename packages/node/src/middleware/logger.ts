/**
 * Structured request logging middleware.
 *
 * Hands one entry per request to an injected log function, which
 * main.ts binds to a pino logger at the entry's level.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { PRINCIPAL_HEADER } from "./principal.js";

export type RequestLogLevel = "info" | "warn" | "error";

export interface RequestLogEntry {
  readonly level: RequestLogLevel;
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** Caller named in X-Principal, when present */
  readonly principal?: string | undefined;
}

/** 5xx is an error, 4xx a warning. */
export function levelForStatus(status: number): RequestLogLevel {
  if (status >= 500) return "error";
  if (status >= 400) return "warn";
  return "info";
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const status = c.res.status;
    log({
      level: levelForStatus(status),
      method: c.req.method,
      path: c.req.path,
      status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      principal: c.req.header(PRINCIPAL_HEADER),
    });
  };
}
