/**
 * Transfer routes.
 *
 * POST /api/v1/transfer   — Move tokens from the caller to a recipient
 * GET  /api/v1/transfers  — Transfer history, filtered by query parameters
 */

import { Hono } from "hono";
import { parseBaseUnits } from "@mintline/ledger";
import type { AppEnv } from "../types/api-contract.js";
import { requirePrincipal } from "../middleware/principal.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { ListTransfersQuerySchema, TransferSchema, toTransferRecordDto } from "../types/dto.js";
import { sendResult } from "./respond.js";

export function createTransferRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/transfer", requirePrincipal(), validateBody(TransferSchema), (c) => {
    const body = c.get("validatedBody");
    const result = c.get("service").execute({
      type: "transfer",
      caller: c.get("principal"),
      to: body.to,
      amount: parseBaseUnits(body.amount),
    });
    return sendResult(c, result, toTransferRecordDto, 201);
  });

  // GET /api/v1/transfers?principal=&kind=&fromSequence=&limit=
  routes.get("/transfers", validateQuery(ListTransfersQuerySchema), (c) => {
    const result = c.get("service").execute({
      type: "get_transfer_history",
      filter: c.get("validatedQuery"),
    });
    return sendResult(c, result, (records) => records.map(toTransferRecordDto));
  });

  return routes;
}
