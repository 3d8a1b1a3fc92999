/**
 * Tests for the X-Principal middleware.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import type { AppEnv, PrincipalEnv } from "../../src/types/api-contract.js";
import { PRINCIPAL_HEADER, requirePrincipal } from "../../src/middleware/principal.js";

function whoAmI(): Hono<AppEnv & PrincipalEnv> {
  const app = new Hono<AppEnv & PrincipalEnv>();
  app.get("/me", requirePrincipal(), (c) => c.json({ principal: c.get("principal") }));
  return app;
}

describe("requirePrincipal", () => {
  it("exposes the trimmed caller", async () => {
    const res = await whoAmI().request("/me", { headers: { [PRINCIPAL_HEADER]: "  alice " } });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ principal: "alice" });
  });

  it("rejects a missing header with 401", async () => {
    const res = await whoAmI().request("/me");

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: { code: "UNAUTHENTICATED", message: "Missing X-Principal header" },
    });
  });

  it("rejects a blank header with 401", async () => {
    const res = await whoAmI().request("/me", { headers: { [PRINCIPAL_HEADER]: "   " } });

    expect(res.status).toBe(401);
  });
});
