/**
 * Limit Policy Engine
 *
 * Pure guard functions consulted before any state mutation. Each returns
 * a PolicyDecision instead of throwing, so callers can inspect a refusal
 * without unwinding; `enforce` turns a refusal into the thrown error.
 *
 * Rules:
 * - Ceilings are inclusive: landing exactly on a ceiling is accepted
 * - Deposit amounts are compared in stable units
 * - Withdrawal amounts are compared in the asset's own units
 * - The per-withdrawal ceiling is checked before the balance
 */

import { VaultError } from "./errors.js";

export type PolicyDecision =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: VaultError };

const ALLOW: PolicyDecision = { ok: true };

function deny(error: VaultError): PolicyDecision {
  return { ok: false, error };
}

export interface DepositCheck {
  /** Stable value of the deposit */
  readonly amount: bigint;
  readonly totalDeposits: bigint;
  readonly globalDepositCeiling: bigint;
  readonly bankCapitalCeiling: bigint;
}

export interface WithdrawalCheck {
  readonly amount: bigint;
  readonly balance: bigint;
  readonly perWithdrawalCeiling: bigint;
}

export function checkAmount(amount: bigint): PolicyDecision {
  if (amount <= 0n) {
    return deny(
      new VaultError("ZERO_AMOUNT", "Amount must be greater than zero", {
        details: { amount: amount.toString() },
      }),
    );
  }
  return ALLOW;
}

export function checkDeposit(check: DepositCheck): PolicyDecision {
  const projected = check.totalDeposits + check.amount;

  if (projected > check.globalDepositCeiling) {
    return deny(
      new VaultError("GLOBAL_LIMIT_EXCEEDED", "Deposit would exceed the global deposit ceiling", {
        details: {
          amount: check.amount.toString(),
          totalDeposits: check.totalDeposits.toString(),
          ceiling: check.globalDepositCeiling.toString(),
        },
      }),
    );
  }

  if (projected > check.bankCapitalCeiling) {
    return deny(
      new VaultError("BANK_CAPITAL_EXCEEDED", "Deposit would exceed the bank capital ceiling", {
        details: {
          amount: check.amount.toString(),
          totalDeposits: check.totalDeposits.toString(),
          ceiling: check.bankCapitalCeiling.toString(),
        },
      }),
    );
  }

  return ALLOW;
}

export function checkWithdrawal(check: WithdrawalCheck): PolicyDecision {
  if (check.amount > check.perWithdrawalCeiling) {
    return deny(
      new VaultError(
        "PER_TRANSACTION_LIMIT_EXCEEDED",
        "Withdrawal exceeds the per-withdrawal ceiling",
        {
          details: {
            amount: check.amount.toString(),
            ceiling: check.perWithdrawalCeiling.toString(),
          },
        },
      ),
    );
  }

  if (check.balance < check.amount) {
    return deny(
      new VaultError("INSUFFICIENT_BALANCE", "Withdrawal exceeds the available balance", {
        details: {
          amount: check.amount.toString(),
          balance: check.balance.toString(),
        },
      }),
    );
  }

  return ALLOW;
}

/**
 * Throw the error carried by a refusal.
 */
export function enforce(decision: PolicyDecision): void {
  if (!decision.ok) {
    throw decision.error;
  }
}
