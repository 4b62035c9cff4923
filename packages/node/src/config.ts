/**
 * @cliffline/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { isAddress, isNullAddress, normalizeAddress } from "@cliffline/types";
import type { Address } from "@cliffline/types";

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

  // Token
  TOKEN_SYMBOL: z.string().min(1).default("VEST"),
  TOKEN_DECIMALS: z.coerce.number().int().min(0).max(18).default(8),
  GENESIS_ALLOCATIONS: z.string().default(""),
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
 * Format: "key1:0xaddr1,key2:0xaddr2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  return splitEntries(raw, "API_KEYS", "key:address").map(([key, address]) => {
    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    return { key, address: parseConfigAddress(address, "API_KEYS") };
  });
}

// =============================================================================
// Genesis Allocations
// =============================================================================

export interface ParsedAllocation {
  readonly address: Address;
  readonly amount: bigint;
}

/**
 * Parse GENESIS_ALLOCATIONS into balances to mint at startup.
 *
 * Format: "0xaddr1:amount1,0xaddr2:amount2" (amounts in base units)
 */
export function parseAllocations(raw: string): readonly ParsedAllocation[] {
  return splitEntries(raw, "GENESIS_ALLOCATIONS", "address:amount").map(
    ([address, amount]) => {
      if (!/^\d+$/.test(amount) || BigInt(amount) === 0n) {
        throw new Error(
          `Invalid amount "${amount}" in GENESIS_ALLOCATIONS. Must be a positive integer in base units`,
        );
      }
      return {
        address: parseConfigAddress(address, "GENESIS_ALLOCATIONS"),
        amount: BigInt(amount),
      };
    },
  );
}

// =============================================================================
// Helpers
// =============================================================================

function splitEntries(
  raw: string,
  name: string,
  format: string,
): readonly [string, string][] {
  if (raw.trim() === "") {
    return [];
  }

  return raw.split(",").map((entry) => {
    const parts = entry.trim().split(":");
    const [first, second] = parts;
    if (parts.length !== 2 || first === undefined || second === undefined) {
      throw new Error(
        `Invalid ${name} entry: "${entry.trim()}". Expected format: ${format}`,
      );
    }
    return [first, second];
  });
}

function parseConfigAddress(value: string, name: string): Address {
  if (!isAddress(value) || isNullAddress(value)) {
    throw new Error(`Invalid address "${value}" in ${name}`);
  }
  return normalizeAddress(value);
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
