/**
 * @custody-gate/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isAddress } from "viem";
import type { Address } from "@custody-gate/types";

// =============================================================================
// Schema
// =============================================================================

const AddressSchema = z
  .string()
  .refine((v): v is Address => isAddress(v, { strict: false }), "Expected a 20-byte hex address");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Authority
  AUTHORITY_ADDRESS: AddressSchema,
  INITIAL_ADMIN: AddressSchema,
  REDEMPTION_DELAY_SECONDS: z.coerce.number().int().min(0).max(604800).default(0),
  SCHEDULE_EXPIRATION_SECONDS: z.coerce.number().int().min(1).default(604800),
  MIN_SETBACK_SECONDS: z.coerce.number().int().min(0).default(432000),

  // Auth
  API_KEYS: z.string().default(""),

  // Files
  BOOTSTRAP_FILE: z.string().min(1).optional(),
  STATE_SNAPSHOT_FILE: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  /** Principal the key acts as. */
  readonly address: Address;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:0xaddress1,key2:0xaddress2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const [key, address, ...rest] = entry.trim().split(":");
    if (key === undefined || address === undefined || rest.length > 0) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:address`,
      );
    }
    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isAddress(address, { strict: false })) {
      throw new Error(`Invalid address "${address}" in API_KEYS`);
    }

    keys.push({ key, address });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
