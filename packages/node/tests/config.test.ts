/**
 * Tests for config.ts: loadConfig.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "../src/config.js";
import { ADMIN, FEED, TEST_ENV, TOKEN, VAULT } from "./setup.js";

const REQUIRED = {
  ADMIN_ADDRESS: ADMIN,
  VAULT_ADDRESS: VAULT,
  STABLE_TOKEN_ADDRESS: TOKEN,
  PRICE_FEED_ADDRESS: FEED,
  BANK_CAPITAL_CEILING: "5000000",
  GLOBAL_DEPOSIT_CEILING: "7000000",
};

describe("loadConfig", () => {
  it("returns defaults for optional variables", () => {
    const config = loadConfig(REQUIRED);

    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.RPC_URL).toBeUndefined();
    expect(config.RPC_TIMEOUT_MS).toBe(10_000);
    expect(config.PER_WITHDRAWAL_CEILING).toBe(10n ** 18n);
    expect(config.ORACLE_HEARTBEAT_SECONDS).toBe(3600);
    expect(config.MANUAL_PRICE).toBe(2000n * 10n ** 8n);
    expect(config.FAUCET_ENABLED).toBe(true);
  });

  it("turns the faucet off with FAUCET_ENABLED=false", () => {
    expect(loadConfig({ ...REQUIRED, FAUCET_ENABLED: "false" }).FAUCET_ENABLED).toBe(false);
    expect(() => loadConfig({ ...REQUIRED, FAUCET_ENABLED: "no" })).toThrow(ZodError);
  });

  it("coerces ceilings to bigint", () => {
    const config = loadConfig(REQUIRED);

    expect(config.BANK_CAPITAL_CEILING).toBe(5_000_000n);
    expect(config.GLOBAL_DEPOSIT_CEILING).toBe(7_000_000n);
  });

  it("keeps ceilings beyond the safe integer range exact", () => {
    const config = loadConfig({ ...REQUIRED, PER_WITHDRAWAL_CEILING: "123456789012345678901234567890" });

    expect(config.PER_WITHDRAWAL_CEILING).toBe(123456789012345678901234567890n);
  });

  it("parses a fractional manual price at 8 decimals", () => {
    const config = loadConfig({ ...REQUIRED, MANUAL_PRICE: "1999.5" });

    expect(config.MANUAL_PRICE).toBe(199_950_000_000n);
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      ...TEST_ENV,
      PORT: "8080",
      HOST: "127.0.0.1",
      LOG_LEVEL: "debug",
      RPC_URL: "http://localhost:8545",
      ORACLE_HEARTBEAT_SECONDS: "60",
    });

    expect(config.PORT).toBe(8080);
    expect(config.HOST).toBe("127.0.0.1");
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("test");
    expect(config.RPC_URL).toBe("http://localhost:8545");
    expect(config.ORACLE_HEARTBEAT_SECONDS).toBe(60);
  });

  it("throws ZodError when required variables are missing", () => {
    expect(() => loadConfig({})).toThrow(ZodError);
  });

  it("throws on a malformed address", () => {
    expect(() => loadConfig({ ...REQUIRED, ADMIN_ADDRESS: "0x1234" })).toThrow(ZodError);
  });

  it("throws on negative or fractional ceilings", () => {
    expect(() => loadConfig({ ...REQUIRED, BANK_CAPITAL_CEILING: "-1" })).toThrow(ZodError);
    expect(() => loadConfig({ ...REQUIRED, GLOBAL_DEPOSIT_CEILING: "1.5" })).toThrow(ZodError);
  });

  it("throws on a manual price with more than 8 decimals", () => {
    expect(() => loadConfig({ ...REQUIRED, MANUAL_PRICE: "1.123456789" })).toThrow(ZodError);
  });

  it("throws on invalid PORT", () => {
    expect(() => loadConfig({ ...REQUIRED, PORT: "0" })).toThrow();
    expect(() => loadConfig({ ...REQUIRED, PORT: "99999" })).toThrow();
  });
});
