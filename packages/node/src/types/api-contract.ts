/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Principal } from "@mintline/types";
import type { LedgerService } from "../services/ledger-service.js";

/**
 * Hono environment type for the Mintline app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The hosted ledger (set for every /api/* request) */
    service: LedgerService;
  };
}

/**
 * Added by the principal middleware on routes that act for a caller.
 */
export interface PrincipalEnv {
  Variables: {
    principal: Principal;
  };
}

/**
 * Added by the body validation middleware.
 */
export interface ValidatedEnv<T> {
  Variables: {
    validatedBody: T;
  };
}

/**
 * Added by the query validation middleware.
 */
export interface ValidatedQueryEnv<T> {
  Variables: {
    validatedQuery: T;
  };
}
