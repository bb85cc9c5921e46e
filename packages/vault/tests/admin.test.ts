/**
 * Tests for AdminControl.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { AdminControl, DEFAULT_PER_WITHDRAWAL_CEILING } from "../src/admin.js";
import { VaultError } from "../src/errors.js";
import { ADMIN, ALICE, FEED, OTHER_FEED } from "./fixtures.js";

describe("AdminControl", () => {
  let admin: AdminControl;

  beforeEach(() => {
    admin = new AdminControl({
      admin: ADMIN,
      oracleReference: FEED,
      bankCapitalCeiling: 1000n,
      globalDepositCeiling: 2000n,
    });
  });

  it("exposes its parameters with the default per-withdrawal ceiling", () => {
    expect(admin.parameters()).toEqual({
      admin: ADMIN,
      bankCapitalCeiling: 1000n,
      globalDepositCeiling: 2000n,
      perWithdrawalCeiling: DEFAULT_PER_WITHDRAWAL_CEILING,
    });
    expect(DEFAULT_PER_WITHDRAWAL_CEILING).toBe(1_000_000_000_000_000_000n);
  });

  it("lets the administrator retune both ceilings", () => {
    expect(admin.setBankCapitalCeiling(ADMIN, 10n)).toBe(1000n);
    expect(admin.setGlobalDepositCeiling(ADMIN, 20n)).toBe(2000n);

    expect(admin.parameters().bankCapitalCeiling).toBe(10n);
    expect(admin.parameters().globalDepositCeiling).toBe(20n);
  });

  it("lets the administrator replace the oracle reference", () => {
    expect(admin.setOracleReference(ADMIN, OTHER_FEED)).toBe(FEED);
    expect(admin.oracleReference).toBe(OTHER_FEED);
  });

  it("compares the administrator case-insensitively", () => {
    admin.setBankCapitalCeiling("0x00000000000000000000000000000000000000AD", 5n);

    expect(admin.parameters().bankCapitalCeiling).toBe(5n);
  });

  it("refuses every setter for anyone else and changes nothing", () => {
    expect(() => admin.setBankCapitalCeiling(ALICE, 1n)).toThrow(VaultError);
    expect(() => admin.setGlobalDepositCeiling(ALICE, 1n)).toThrow(
      "Only the administrator may call setGlobalDepositCeiling",
    );
    expect(() => admin.setOracleReference(ALICE, OTHER_FEED)).toThrow(VaultError);

    expect(admin.parameters().bankCapitalCeiling).toBe(1000n);
    expect(admin.parameters().globalDepositCeiling).toBe(2000n);
    expect(admin.oracleReference).toBe(FEED);
  });

  it("tags refusals as UNAUTHORIZED with the caller", () => {
    try {
      admin.setOracleReference(ALICE, OTHER_FEED);
      expect.fail("Should have thrown");
    } catch (err) {
      expect((err as VaultError).code).toBe("UNAUTHORIZED");
      expect((err as VaultError).details).toEqual({
        caller: ALICE,
        operation: "setOracleReference",
      });
    }
  });
});
