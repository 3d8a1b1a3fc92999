/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import { asPrincipal, createTestApp } from "../setup.js";
import { levelForStatus } from "../../src/middleware/logger.js";
import type { RequestLogEntry } from "../../src/middleware/logger.js";

describe("loggerMiddleware", () => {
  it("calls logFn with request details", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    const res = await app.request("/health");

    expect(entries).toHaveLength(1);
    const [entry] = entries;
    expect(entry).toMatchObject({
      level: "info",
      method: "GET",
      path: "/health",
      status: 200,
      requestId: res.headers.get("X-Request-Id"),
      principal: undefined,
    });
    expect(entry?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("records the caller and the final status of rejected requests", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(asPrincipal("bob", "/api/v1/mint", "POST", { to: "bob", amount: "5" }));

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: "warn",
      method: "POST",
      path: "/api/v1/mint",
      status: 403,
      principal: "bob",
    });
  });

  it("logs nothing when no logFn is given", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);
  });
});

describe("levelForStatus", () => {
  it("maps status classes to log levels", () => {
    expect(levelForStatus(201)).toBe("info");
    expect(levelForStatus(304)).toBe("info");
    expect(levelForStatus(422)).toBe("warn");
    expect(levelForStatus(503)).toBe("error");
  });
});
