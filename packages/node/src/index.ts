/**
 * @mintline/node — HTTP host for the Mintline token ledger.
 *
 * Package public API. The server itself starts from main.ts.
 */

export { LedgerService } from "./services/ledger-service.js";
export type { LedgerServiceConfig, ReadinessReport } from "./services/ledger-service.js";
export { loadConfig, toLedgerConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
