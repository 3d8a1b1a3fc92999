/**
 * Token and owner routes.
 *
 * GET  /api/v1/token  — Token metadata and total supply
 * GET  /api/v1/owner  — Current owner
 * POST /api/v1/owner  — Hand the owner role to another principal
 * POST /api/v1/mint   — Owner mints tokens to a recipient
 * POST /api/v1/burn   — Caller burns their own tokens
 */

import { Hono } from "hono";
import { parseBaseUnits } from "@mintline/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { requirePrincipal } from "../middleware/principal.js";
import { validateBody } from "../middleware/validate.js";
import {
  BurnSchema,
  ChangeOwnerSchema,
  MintSchema,
  toTokenInfoDto,
  toTransferRecordDto,
} from "../types/dto.js";
import { sendResult } from "./respond.js";

export function createTokenRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/token", (c) => {
    const result = c.get("service").execute({ type: "get_token_info" });
    return sendResult(c, result, toTokenInfoDto);
  });

  routes.get("/owner", (c) => {
    const result = c.get("service").execute({ type: "get_owner" });
    return sendResult(c, result, (owner) => ({ owner }));
  });

  routes.post("/owner", requirePrincipal(), validateBody(ChangeOwnerSchema), (c) => {
    const body = c.get("validatedBody");
    const result = c.get("service").execute({
      type: "change_owner",
      caller: c.get("principal"),
      newOwner: body.newOwner,
    });
    return sendResult(c, result, (previousOwner) => ({ previousOwner, owner: body.newOwner }));
  });

  routes.post("/mint", requirePrincipal(), validateBody(MintSchema), (c) => {
    const body = c.get("validatedBody");
    const result = c.get("service").execute({
      type: "mint",
      caller: c.get("principal"),
      to: body.to,
      amount: parseBaseUnits(body.amount),
    });
    return sendResult(c, result, toTransferRecordDto, 201);
  });

  routes.post("/burn", requirePrincipal(), validateBody(BurnSchema), (c) => {
    const body = c.get("validatedBody");
    const result = c.get("service").execute({
      type: "burn",
      caller: c.get("principal"),
      amount: parseBaseUnits(body.amount),
    });
    return sendResult(c, result, toTransferRecordDto, 201);
  });

  return routes;
}
