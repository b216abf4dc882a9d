/**
 * Tests for config.ts — loadConfig + protocolParametersFromConfig.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig, protocolParametersFromConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("fills every default from an empty environment", () => {
    const config = loadConfig({});
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.NODE_URL).toBe("http://localhost:14265");
    expect(config.REQUEST_TIMEOUT_MS).toBe(30000);
    expect(config.COIN_TYPE).toBe(4219);
    expect(config.TOKEN_SUPPLY).toBe(1_813_620_509_061_365n);
    expect(config.SUBMIT_MAX_ATTEMPTS).toBe(3);
    expect(config.CONFIRM_MAX_ATTEMPTS).toBe(40);
    expect(config.SECRET_STORE_PATH).toBe("./wallet.secret.json");
    expect(config.KDF_ITERATIONS).toBe(600000);
  });

  it("coerces numeric strings", () => {
    const config = loadConfig({ REQUEST_TIMEOUT_MS: "500", COIN_TYPE: "1", VBYTE_COST: "250" });
    expect(config.REQUEST_TIMEOUT_MS).toBe(500);
    expect(config.COIN_TYPE).toBe(1);
    expect(config.VBYTE_COST).toBe(250);
  });

  it("keeps large token supplies exact", () => {
    expect(loadConfig({ TOKEN_SUPPLY: "18446744073709551615" }).TOKEN_SUPPLY).toBe(18_446_744_073_709_551_615n);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ NODE_URL: "not a url" })).toThrow(ZodError);
    expect(() => loadConfig({ REQUEST_TIMEOUT_MS: "0" })).toThrow(ZodError);
    expect(() => loadConfig({ TOKEN_SUPPLY: "12.5" })).toThrow("Expected a decimal integer");
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(ZodError);
  });
});

describe("protocolParametersFromConfig", () => {
  it("maps protocol and rent settings", () => {
    const config = loadConfig({ NETWORK_NAME: "shimmer", BECH32_HRP: "smr", VBYTE_FACTOR_KEY: "20" });
    expect(protocolParametersFromConfig(config)).toEqual({
      networkName: "shimmer",
      bech32Hrp: "smr",
      tokenSupply: 1_813_620_509_061_365n,
      rentStructure: { vByteCost: 100, vByteFactorData: 1, vByteFactorKey: 20 },
    });
  });
});
