/**
 * @strongroom/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Amounts are decimal strings of smallest units, coerced to bigint.
 */

import { z } from "zod";
import { isAddress } from "@strongroom/types";
import type { Address } from "@strongroom/types";
import { parseUnits } from "@strongroom/ledger";
import { DEFAULT_HEARTBEAT_SECONDS, FEED_DECIMALS } from "@strongroom/price-oracle";

// =============================================================================
// Field Schemas
// =============================================================================

const AddressSchema = z.custom<Address>(
  isAddress,
  "Expected a 0x-prefixed 20-byte hex address",
);

/** Non-negative integer in smallest units. */
const UnitsSchema = z
  .string()
  .regex(/^\d+$/, "Expected a non-negative integer amount")
  .transform((v) => BigInt(v));

/** Whole-unit price with up to 8 decimals ("2000", "1999.5"). */
const PriceSchema = z
  .string()
  .regex(/^\d+(\.\d{1,8})?$/, "Expected a decimal price with at most 8 decimals")
  .transform((v) => parseUnits(v, FEED_DECIMALS));

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

  // Chain access (manual price feed when absent)
  RPC_URL: z.string().url().optional(),
  RPC_TIMEOUT_MS: z.coerce.number().int().min(100).default(10_000),

  // Identities
  ADMIN_ADDRESS: AddressSchema,
  VAULT_ADDRESS: AddressSchema,
  STABLE_TOKEN_ADDRESS: AddressSchema,
  PRICE_FEED_ADDRESS: AddressSchema,

  // Policy
  BANK_CAPITAL_CEILING: UnitsSchema,
  GLOBAL_DEPOSIT_CEILING: UnitsSchema,
  PER_WITHDRAWAL_CEILING: UnitsSchema.default("1000000000000000000"),
  ORACLE_HEARTBEAT_SECONDS: z.coerce.number().int().min(1).default(DEFAULT_HEARTBEAT_SECONDS),

  // Manual feed
  MANUAL_PRICE: PriceSchema.default("2000"),

  // In-process rails: POST /api/v1/faucet funds accounts when enabled
  FAUCET_ENABLED: z
    .enum(["true", "false"])
    .default("true")
    .transform((v) => v === "true"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

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
