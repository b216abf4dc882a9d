/**
 * @tanglekit/wallet — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { ProtocolParameters } from "@tanglekit/types";

// =============================================================================
// Schema
// =============================================================================

const Integer = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Node
  NODE_URL: z.string().url().default("http://localhost:14265"),
  REQUEST_TIMEOUT_MS: Integer(30000, 1),

  // Protocol
  NETWORK_NAME: z.string().min(1).default("testnet"),
  BECH32_HRP: z.string().min(1).default("rms"),
  COIN_TYPE: Integer(4219),
  TOKEN_SUPPLY: z
    .string()
    .regex(/^\d+$/, "Expected a decimal integer")
    .default("1813620509061365")
    .transform((s) => BigInt(s)),
  VBYTE_COST: Integer(100),
  VBYTE_FACTOR_DATA: Integer(1),
  VBYTE_FACTOR_KEY: Integer(10),

  // Submission & confirmation
  SUBMIT_MAX_ATTEMPTS: Integer(3, 1),
  CONFIRM_INTERVAL_MS: Integer(1000, 1),
  CONFIRM_MAX_ATTEMPTS: Integer(40, 1),
  CONFIRM_MAX_WAIT_MS: Integer(300000, 1),

  // Secret store
  SECRET_STORE_PATH: z.string().min(1).default("./wallet.secret.json"),
  KDF_ITERATIONS: Integer(600000, 1),
});

export type WalletConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): WalletConfig {
  return ConfigSchema.parse(env);
}

export function protocolParametersFromConfig(config: WalletConfig): ProtocolParameters {
  return {
    networkName: config.NETWORK_NAME,
    bech32Hrp: config.BECH32_HRP,
    tokenSupply: config.TOKEN_SUPPLY,
    rentStructure: {
      vByteCost: config.VBYTE_COST,
      vByteFactorData: config.VBYTE_FACTOR_DATA,
      vByteFactorKey: config.VBYTE_FACTOR_KEY,
    },
  };
}
