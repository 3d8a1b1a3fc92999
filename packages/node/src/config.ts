/**
 * @mintline/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { LedgerConfig } from "@mintline/ledger";

// =============================================================================
// Schema
// =============================================================================

const BaseUnits = z
  .string()
  .regex(/^\d+$/, "must be an unsigned integer string of base units");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Token
  TOKEN_NAME: z.string().min(1).default("Mintline Token"),
  TOKEN_SYMBOL: z.string().min(1).default("MLT"),
  TOKEN_DECIMALS: z.coerce.number().int().min(0).max(18).default(8),
  INITIAL_SUPPLY: BaseUnits.default("1000000000000000000").transform((v) => BigInt(v)),
  MAX_SUPPLY: BaseUnits.transform((v) => BigInt(v)).optional(),
  OWNER_PRINCIPAL: z.string().min(1).default("deployer"),

  // Persistence (JSONL journal when set, memory-only otherwise)
  JOURNAL_PATH: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * Token parameters for the ledger this node hosts.
 */
export function toLedgerConfig(config: AppConfig): LedgerConfig {
  return {
    name: config.TOKEN_NAME,
    symbol: config.TOKEN_SYMBOL,
    decimals: config.TOKEN_DECIMALS,
    owner: config.OWNER_PRINCIPAL,
    initialSupply: config.INITIAL_SUPPLY,
    maxSupply: config.MAX_SUPPLY,
  };
}
