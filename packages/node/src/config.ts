/**
 * @amoca/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isAddress, normalizeAddress } from "@amoca/types";
import type { Address } from "@amoca/types";
import { MAX_REWARD_RATE } from "@amoca/staking";
import type { ProtocolConfig } from "./services/protocol.js";

// =============================================================================
// Schema
// =============================================================================

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

  // Genesis
  TREASURY_ADDRESS: z
    .string()
    .refine(isAddress, "Must be a 0x-prefixed hex address")
    .transform(normalizeAddress),
  REWARD_RATE: z.coerce.number().int().min(0).max(MAX_REWARD_RATE).default(5),
  MIN_STAKE_DURATION: z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER).default(86400),

  // Trust gaps
  VOTE_WEIGHT_MODE: z.enum(["declared", "staked"]).default("declared"),
  ACCESS_ISSUERS: z.string().default(""),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
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
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, address] = parts;
    if (parts.length !== 2 || key === undefined || address === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:address`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isAddress(address)) {
      throw new Error(`Invalid address "${address}" in API_KEYS`);
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key in API_KEYS: "${key}"`);
    }
    seen.add(key);

    keys.push({ key, address: normalizeAddress(address) });
  }

  return keys;
}

/**
 * Parse a comma-separated address list (ACCESS_ISSUERS).
 */
export function parseAddressList(raw: string, name: string): readonly Address[] {
  if (raw.trim() === "") {
    return [];
  }

  return raw.split(",").map((entry) => {
    const address = entry.trim();
    if (!isAddress(address)) {
      throw new Error(`Invalid address "${address}" in ${name}`);
    }
    return normalizeAddress(address);
  });
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

/**
 * Genesis parameters for the protocol, taken from loaded config.
 */
export function toProtocolConfig(config: AppConfig): ProtocolConfig {
  return {
    treasury: config.TREASURY_ADDRESS,
    rewardRate: config.REWARD_RATE,
    minStakeDuration: config.MIN_STAKE_DURATION,
    voteWeightMode: config.VOTE_WEIGHT_MODE,
    accessIssuers: parseAddressList(config.ACCESS_ISSUERS, "ACCESS_ISSUERS"),
  };
}
