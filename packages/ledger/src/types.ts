/**
 * @strongroom/ledger: Types for the vault ledger.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are bigints in the asset's smallest unit
 * - Snapshot amounts are decimal strings (JSON-safe)
 * - Fail-closed: invalid records throw, never silently succeed
 */

import type { Address, AssetId } from "@strongroom/types";

// ─── Balances ────────────────────────────────────────────────────────────

/**
 * One non-zero balance held by a user.
 */
export interface AssetBalance {
  readonly asset: AssetId;
  readonly amount: bigint;
}

/**
 * Aggregate counters maintained alongside the balance table.
 */
export interface LedgerTotals {
  /** Sum of stable values of every accepted deposit. Never decreases. */
  readonly totalDeposits: bigint;
  readonly depositCount: bigint;
  readonly withdrawalCount: bigint;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

export interface SnapshotBalance {
  readonly user: Address;
  readonly asset: AssetId;
  readonly amount: string;
}

/**
 * Serializable snapshot of the ledger state.
 * Used for persistence and rehydration.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly balances: readonly SnapshotBalance[];
  readonly totalDeposits: string;
  readonly depositCount: string;
  readonly withdrawalCount: string;
  readonly createdAt: string;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INSUFFICIENT_BALANCE"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the ledger.
 * Always thrown; never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
