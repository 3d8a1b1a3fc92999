/**
 * Health check routes.
 *
 * GET /health — Liveness probe
 * GET /ready  — Readiness probe (journal hash chain + ledger invariants)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { LedgerService } from "../services/ledger-service.js";

export function createHealthRoutes(service: LedgerService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const report = service.checkReadiness();
    const body = {
      status: report.ready ? "ready" : "not_ready",
      journal: {
        valid: report.journal.valid,
        size: service.journal.size,
        lastVerifiedPosition: report.journal.lastVerifiedPosition,
        errors: report.journal.errors,
      },
      invariants: report.invariants,
      timestamp: new Date().toISOString(),
    };

    return report.ready ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
