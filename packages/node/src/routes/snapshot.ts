/**
 * GET /api/v1/snapshot — Full JSON-safe ledger snapshot.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createSnapshotRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/snapshot", (c) => {
    return c.json({ data: c.get("service").snapshot() });
  });

  return routes;
}
