/**
 * Administrative Control
 *
 * Holds the administrator identity and the tunable policy parameters.
 * The administrator is fixed at construction; there is no transfer of
 * the role.
 *
 * Rules:
 * - Every setter checks the caller first and changes nothing on refusal
 * - Changes take effect immediately, with no bounds check against totals
 * - The per-withdrawal ceiling is a constant, readable but not settable
 * - Address comparison is case-insensitive
 */

import { sameAddress } from "@strongroom/types";
import type { Address } from "@strongroom/types";
import { VaultError } from "./errors.js";
import type { VaultParameters } from "./types.js";

/** 1 unit of an 18-decimal asset. */
export const DEFAULT_PER_WITHDRAWAL_CEILING = 10n ** 18n;

export interface AdminControlOptions {
  readonly admin: Address;
  readonly oracleReference: Address;
  readonly bankCapitalCeiling: bigint;
  readonly globalDepositCeiling: bigint;
  readonly perWithdrawalCeiling?: bigint | undefined;
}

export class AdminControl {
  readonly admin: Address;
  readonly perWithdrawalCeiling: bigint;
  private _oracleReference: Address;
  private _bankCapitalCeiling: bigint;
  private _globalDepositCeiling: bigint;

  constructor(options: AdminControlOptions) {
    this.admin = options.admin;
    this.perWithdrawalCeiling = options.perWithdrawalCeiling ?? DEFAULT_PER_WITHDRAWAL_CEILING;
    this._oracleReference = options.oracleReference;
    this._bankCapitalCeiling = options.bankCapitalCeiling;
    this._globalDepositCeiling = options.globalDepositCeiling;
  }

  get oracleReference(): Address {
    return this._oracleReference;
  }

  /**
   * Replace the oracle reference. Returns the previous one.
   */
  setOracleReference(caller: Address, reference: Address): Address {
    this.authorize(caller, "setOracleReference");
    const previous = this._oracleReference;
    this._oracleReference = reference;
    return previous;
  }

  /**
   * Retune the bank capital ceiling. Returns the previous value.
   */
  setBankCapitalCeiling(caller: Address, value: bigint): bigint {
    this.authorize(caller, "setBankCapitalCeiling");
    const previous = this._bankCapitalCeiling;
    this._bankCapitalCeiling = value;
    return previous;
  }

  /**
   * Retune the global deposit ceiling. Returns the previous value.
   */
  setGlobalDepositCeiling(caller: Address, value: bigint): bigint {
    this.authorize(caller, "setGlobalDepositCeiling");
    const previous = this._globalDepositCeiling;
    this._globalDepositCeiling = value;
    return previous;
  }

  isAdmin(caller: Address): boolean {
    return sameAddress(caller, this.admin);
  }

  parameters(): VaultParameters {
    return {
      admin: this.admin,
      bankCapitalCeiling: this._bankCapitalCeiling,
      globalDepositCeiling: this._globalDepositCeiling,
      perWithdrawalCeiling: this.perWithdrawalCeiling,
    };
  }

  private authorize(caller: Address, operation: string): void {
    if (!this.isAdmin(caller)) {
      throw new VaultError("UNAUTHORIZED", `Only the administrator may call ${operation}`, {
        details: { caller, operation },
      });
    }
  }
}
