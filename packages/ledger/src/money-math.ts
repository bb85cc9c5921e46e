/**
 * @strongroom/ledger: Deterministic amount arithmetic.
 *
 * Amounts cross the HTTP and event boundaries as decimal strings and live
 * in the ledger as bigint counts of an asset's smallest unit (wei for the
 * native asset, 10^-6 for the stable token).
 *
 * Rules:
 * - No floating-point operations
 * - Fractional digits beyond an asset's decimals are rejected, not rounded
 */

import { LedgerError } from "./types.js";

const DECIMAL_PATTERN = /^(-?)(\d+)(?:\.(\d+))?$/;

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();
  if (trimmed === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${amount}"`);
  }

  const match = DECIMAL_PATTERN.exec(trimmed);
  if (match === null) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const [, sign = "", whole = "0", fraction = ""] = match;
  if (fraction.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fraction.length)} decimal places, but the asset allows ${String(decimals)}`,
    );
  }

  const magnitude = BigInt(whole) * 10n ** BigInt(decimals) + BigInt(fraction.padEnd(decimals, "0") || "0");
  return sign === "-" ? -magnitude : magnitude;
}

/**
 * Render a scaled bigint as a decimal string with exactly `decimals`
 * fractional digits.
 *
 * 100000000n with decimals=6 → "100.000000"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  const sign = scaled < 0n ? "-" : "";
  const magnitude = scaled < 0n ? -scaled : scaled;
  if (decimals === 0) {
    return `${sign}${magnitude}`;
  }

  const unit = 10n ** BigInt(decimals);
  const fraction = (magnitude % unit).toString().padStart(decimals, "0");
  return `${sign}${magnitude / unit}.${fraction}`;
}

/**
 * Parse a non-negative whole-unit amount ("1.5" ETH) into smallest units.
 */
export function parseUnits(amount: string, decimals: number): bigint {
  const value = parseAmount(amount, decimals);
  if (value < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Amount must not be negative: "${amount.trim()}"`);
  }
  return value;
}
