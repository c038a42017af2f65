/**
 * @collegium/node - Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

const flag = z
  .string()
  .transform((v) => v === "true")
  .default("false");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Organization
  ORG_OWNER: z.string().min(1).default("collegium:owner"),
  ORG_TREASURY: z.string().min(1).default("collegium:treasury"),
  BOARD_MEMBERS: z.string().default(""),
  PROPOSAL_DURATION_SECONDS: z.coerce.number().int().min(1).default(180),

  // Payment asset
  PAYMENT_ASSET: z.string().min(1).default("EDU"),
  PAYMENT_DECIMALS: z.coerce.number().int().min(0).max(36).default(18),

  // Auth
  API_KEYS: z.string().default(""),
  JWT_SECRET: z.string().optional(),
  JWT_ISSUER: z.string().default("collegium"),

  // Idempotency
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86400000),

  // Local development: exposes POST /api/v1/ledger/mint
  DEV_FAUCET: flag,
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// List Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly account: string;
}

/**
 * Parse the API_KEYS env var.
 *
 * Format: "key1:account1,key2:account2". The account is everything after
 * the first colon, so accounts may contain colons themselves.
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const trimmed = entry.trim();
    const separator = trimmed.indexOf(":");
    if (separator === -1) {
      throw new Error(
        `Invalid API_KEYS entry: "${trimmed}". Expected format: key:account`,
      );
    }

    const key = trimmed.slice(0, separator);
    const account = trimmed.slice(separator + 1);

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (account === "") {
      throw new Error(`Account cannot be empty for API key "${key}"`);
    }

    keys.push({ key, account });
  }

  return keys;
}

/**
 * Parse BOARD_MEMBERS: comma-separated accounts, blanks ignored.
 */
export function parseBoardMembers(raw: string): readonly string[] {
  return raw
    .split(",")
    .map((account) => account.trim())
    .filter((account) => account !== "");
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
