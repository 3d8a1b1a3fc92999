/**
 * Account routes.
 *
 * POST /api/v1/wallets              — Create the caller's wallet (idempotent)
 * GET  /api/v1/balances/:principal  — Balance of any principal
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { requirePrincipal } from "../middleware/principal.js";
import { toBalanceDto } from "../types/dto.js";
import { sendFailure, sendResult } from "./respond.js";

export function createWalletRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/wallets — 201 when created, 200 when it already existed
  routes.post("/wallets", requirePrincipal(), (c) => {
    const result = c.get("service").execute({
      type: "create_wallet",
      caller: c.get("principal"),
    });
    if (!result.ok) {
      return sendFailure(c, result.error);
    }
    return c.json({ data: result.value }, result.value.created ? 201 : 200);
  });

  // GET /api/v1/balances/:principal
  routes.get("/balances/:principal", (c) => {
    const principal = c.req.param("principal");
    const result = c.get("service").execute({ type: "get_balance", principal });
    return sendResult(c, result, (balance) => toBalanceDto({ principal, balance }));
  });

  return routes;
}
