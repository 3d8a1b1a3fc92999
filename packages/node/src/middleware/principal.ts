/**
 * Caller identity middleware.
 *
 * Authentication happens upstream; the authenticated caller arrives
 * as an opaque principal in the X-Principal header. Routes that act
 * on behalf of a caller reject requests without one.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv, PrincipalEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const PRINCIPAL_HEADER = "X-Principal";

export function requirePrincipal(): MiddlewareHandler<AppEnv & PrincipalEnv> {
  return async (c, next) => {
    const principal = c.req.header(PRINCIPAL_HEADER)?.trim();
    if (principal === undefined || principal === "") {
      return c.json(
        createErrorEnvelope("UNAUTHENTICATED", `Missing ${PRINCIPAL_HEADER} header`),
        401,
      );
    }

    c.set("principal", principal);
    return next();
  };
}
