/**
 * Test helpers for @mintline/node.
 *
 * Provides a test app factory that creates a Hono app with
 * all middleware and routes, but no HTTP server.
 */

import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";
import type { LedgerServiceConfig } from "../src/services/ledger-service.js";

export const TS = "2024-01-01T00:00:00.000Z";
export const OWNER = "owner";

export const TEST_SERVICE_CONFIG: LedgerServiceConfig = {
  token: {
    name: "Test Token",
    symbol: "TST",
    decimals: 2,
    owner: OWNER,
    initialSupply: 1_000_000n,
  },
  clock: () => TS,
};

/**
 * Create a test app with an in-memory journal, a fixed clock and
 * silent logging.
 */
export function createTestApp(overrides?: Partial<CreateAppOptions>): AppInstance {
  return createApp({ service: TEST_SERVICE_CONFIG, ...overrides });
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/**
 * Request made on behalf of `principal` via X-Principal.
 */
export function asPrincipal(
  principal: string,
  path: string,
  method: string = "POST",
  body?: unknown,
): Request {
  return jsonRequest(path, method, body, { "X-Principal": principal });
}
