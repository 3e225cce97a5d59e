/**
 * @stakewell/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { Role } from "./types/auth.js";
import { isRole } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

const AddressSchema = z.string().trim().min(1);

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Ledger
  ADMIN_ADDRESS: AddressSchema.default("admin"),
  LEDGER_ADDRESS: AddressSchema.default("stake-ledger"),
  BASE_ASSET_SYMBOL: z.string().min(1).max(16).default("STK"),
  REWARD_ASSET_SYMBOL: z.string().min(1).max(16).default("esSTK"),
}).refine((config) => config.ADMIN_ADDRESS !== config.LEDGER_ADDRESS, {
  message: "ADMIN_ADDRESS must differ from LEDGER_ADDRESS",
  path: ["ADMIN_ADDRESS"],
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
  /** Ledger address the key acts as */
  readonly address: string;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:address1,key2:role2:address2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    if (parts.length !== 3) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:address`,
      );
    }

    const [key = "", role = "", address = ""] = parts;

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, staker, or viewer`,
      );
    }
    if (address === "") {
      throw new Error("Address cannot be empty in API_KEYS");
    }

    keys.push({ key, role, address });
  }

  return keys;
}

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
