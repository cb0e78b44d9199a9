/**
 * @ledgerkit/process — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { Address, Quantity } from "@ledgerkit/types";
import { isAddress, isQuantityString } from "@ledgerkit/types";

// =============================================================================
// Schema
// =============================================================================

const booleanFlag = (fallback: "true" | "false") =>
  z
    .string()
    .transform((v) => v === "true")
    .default(fallback);

const approvals = z.coerce.number().int().min(1).default(1);

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Identity of this process; implicitly a minter
  PROCESS_ID: z
    .string()
    .refine(isAddress, "PROCESS_ID must be a 43-character address")
    .optional(),

  // Token metadata
  TOKEN_NAME: z.string().min(1).default("Token"),
  TOKEN_TICKER: z.string().min(1).default("TKN"),
  TOKEN_LOGO: z.string().optional(),
  TOKEN_DENOMINATION: z.coerce.number().int().min(1).default(12),
  INITIAL_BALANCES: z.string().default(""),

  // Governance
  BURNERS: z.string().default(""),
  MINTERS: z.string().default(""),
  REQUIRED_BURN_APPROVALS: approvals,
  REQUIRED_MINT_APPROVALS: approvals,
  COUNT_DUPLICATE_APPROVALS: booleanFlag("false"),

  // External transfers
  AUTHORIZED_EXTERNAL_TARGETS: z.string().default(""),

  // Error notices to callers
  SEND_ERROR_NOTICES: booleanFlag("true"),
});

export type ProcessConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// List Parsing
// =============================================================================

function entries(raw: string): string[] {
  if (raw.trim() === "") {
    return [];
  }
  return raw.split(",").map((entry) => entry.trim());
}

/**
 * Parse a comma-separated list of non-empty names.
 *
 * Format: "name1,name2"
 */
export function parseList(raw: string, name: string): readonly string[] {
  const list = entries(raw);
  for (const entry of list) {
    if (entry === "") {
      throw new Error(`Invalid ${name} entry: empty value`);
    }
  }
  return list;
}

/**
 * Parse a comma-separated list of addresses.
 *
 * Format: "address1,address2"
 */
export function parseAddressList(raw: string, name: string): readonly Address[] {
  const list = entries(raw);
  for (const entry of list) {
    if (!isAddress(entry)) {
      throw new Error(
        `Invalid ${name} entry: "${entry}". Expected a 43-character address`,
      );
    }
  }
  return list;
}

/**
 * Parse the INITIAL_BALANCES env var.
 *
 * Format: "address1:quantity1,address2:quantity2"
 */
export function parseBalanceList(raw: string): ReadonlyMap<Address, Quantity> {
  const balances = new Map<Address, Quantity>();

  for (const entry of entries(raw)) {
    const parts = entry.split(":");
    if (parts.length !== 2) {
      throw new Error(
        `Invalid INITIAL_BALANCES entry: "${entry}". Expected format: address:quantity`,
      );
    }

    const [address = "", quantity = ""] = parts;

    if (!isAddress(address)) {
      throw new Error(`Invalid INITIAL_BALANCES address: "${address}"`);
    }
    if (!isQuantityString(quantity)) {
      throw new Error(
        `Invalid INITIAL_BALANCES quantity for "${address}": "${quantity}". Expected a non-negative integer`,
      );
    }
    if (balances.has(address)) {
      throw new Error(`Duplicate INITIAL_BALANCES entry for "${address}"`);
    }

    balances.set(address, BigInt(quantity));
  }

  return balances;
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
): ProcessConfig {
  return ConfigSchema.parse(env);
}
