/**
 * Tests for token, owner, mint and burn routes.
 */

import { describe, it, expect } from "vitest";
import { asPrincipal, createTestApp, jsonRequest, OWNER, TS } from "../setup.js";

describe("GET /api/v1/token", () => {
  it("returns token metadata with the supply as a string", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/token");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: { name: "Test Token", symbol: "TST", decimals: 2, totalSupply: "1000000" },
    });
  });
});

describe("owner routes", () => {
  it("GET /owner returns the deployer", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/owner");

    expect(await res.json()).toEqual({ data: { owner: OWNER } });
  });

  it("POST /owner hands the role over", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      asPrincipal(OWNER, "/api/v1/owner", "POST", { newOwner: "alice" }),
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ data: { previousOwner: OWNER, owner: "alice" } });

    const after = await app.request("/api/v1/owner");
    expect(await after.json()).toEqual({ data: { owner: "alice" } });
  });

  it("POST /owner by a non-owner is 403", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      asPrincipal("mallory", "/api/v1/owner", "POST", { newOwner: "mallory" }),
    );

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({
      error: { code: "UNAUTHORIZED", message: '"mallory" is not the owner' },
    });
  });

  it("POST /owner trims the new owner", async () => {
    const { app, service } = createTestApp();
    const res = await app.request(
      asPrincipal(OWNER, "/api/v1/owner", "POST", { newOwner: " alice " }),
    );

    expect(await res.json()).toEqual({ data: { previousOwner: OWNER, owner: "alice" } });
    expect(service.ledger.getOwner()).toBe("alice");
  });

  it("POST /owner without a new owner is 400", async () => {
    const { app } = createTestApp();
    const res = await app.request(asPrincipal(OWNER, "/api/v1/owner", "POST", {}));

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});

describe("POST /api/v1/mint", () => {
  it("mints to a recipient and returns the record", async () => {
    const { app, service } = createTestApp();
    const res = await app.request(
      asPrincipal(OWNER, "/api/v1/mint", "POST", { to: "bob", amount: "500" }),
    );

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      data: { sequence: 2, kind: "mint", from: null, to: "bob", amount: "500", timestamp: TS },
    });
    expect(service.ledger.getBalance("bob")).toBe(500n);
    expect(service.ledger.getTokenInfo().totalSupply).toBe(1_000_500n);
  });

  it("trims the recipient so it matches the caller header", async () => {
    const { app, service } = createTestApp();
    const res = await app.request(
      asPrincipal(OWNER, "/api/v1/mint", "POST", { to: "  bob ", amount: "500" }),
    );

    expect(res.status).toBe(201);
    expect(service.ledger.getBalance("bob")).toBe(500n);
    expect(service.ledger.hasAccount("  bob ")).toBe(false);

    const spend = await app.request(
      asPrincipal(" bob", "/api/v1/transfer", "POST", { to: "carol", amount: "500" }),
    );
    expect(spend.status).toBe(201);
  });

  it("rejects a blank recipient", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      asPrincipal(OWNER, "/api/v1/mint", "POST", { to: "   ", amount: "500" }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });

  it("rejects a non-owner with 403", async () => {
    const { app, service } = createTestApp();
    const res = await app.request(
      asPrincipal("bob", "/api/v1/mint", "POST", { to: "bob", amount: "500" }),
    );

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({
      error: { code: "UNAUTHORIZED", message: '"bob" is not the owner and cannot mint' },
    });
    expect(service.ledger.transferCount).toBe(1);
  });

  it("requires X-Principal", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/api/v1/mint", "POST", { to: "bob", amount: "500" }),
    );

    expect(res.status).toBe(401);
  });

  it("rejects fractional amounts as a validation error", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      asPrincipal(OWNER, "/api/v1/mint", "POST", { to: "bob", amount: "1.5" }),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: "VALIDATION_ERROR",
        message: "Request body validation failed",
        details: {
          issues: [
            { path: "amount", message: "amount must be an unsigned integer string of base units" },
          ],
        },
      },
    });
  });

  it("rejects numeric amounts", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      asPrincipal(OWNER, "/api/v1/mint", "POST", { to: "bob", amount: 500 }),
    );

    expect(res.status).toBe(400);
  });

  it("rejects a zero amount with INVALID_AMOUNT", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      asPrincipal(OWNER, "/api/v1/mint", "POST", { to: "bob", amount: "0" }),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: "INVALID_AMOUNT", message: "Amount must be greater than zero, got 0" },
    });
  });

  it("rejects amounts beyond 128 bits with OVERFLOW", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      asPrincipal(OWNER, "/api/v1/mint", "POST", { to: "bob", amount: "1" + "0".repeat(40) }),
    );

    expect(res.status).toBe(422);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("OVERFLOW");
  });

  it("rejects malformed JSON", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      new Request("http://localhost/api/v1/mint", {
        method: "POST",
        headers: { "Content-Type": "application/json", "X-Principal": OWNER },
        body: "{not json",
      }),
    );

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: "VALIDATION_ERROR", message: "Invalid JSON in request body" },
    });
  });
});

describe("POST /api/v1/burn", () => {
  it("burns the caller's own tokens", async () => {
    const { app, service } = createTestApp();
    const res = await app.request(asPrincipal(OWNER, "/api/v1/burn", "POST", { amount: "250" }));

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      data: { sequence: 2, kind: "burn", from: OWNER, to: null, amount: "250", timestamp: TS },
    });
    expect(service.ledger.getTokenInfo().totalSupply).toBe(999_750n);
  });

  it("rejects burning more than the balance", async () => {
    const { app } = createTestApp();
    const res = await app.request(asPrincipal("bob", "/api/v1/burn", "POST", { amount: "1" }));

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      error: { code: "INSUFFICIENT_BALANCE", message: '"bob" has 0, cannot burn 1' },
    });
  });
});
