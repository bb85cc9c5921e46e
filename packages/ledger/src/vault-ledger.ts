/**
 * @strongroom/ledger: Vault ledger.
 *
 * Exclusive owner of the per-user, per-asset balance table and the
 * aggregate counters. Every mutation is all-or-nothing.
 *
 * API surface:
 * - recordDeposit(): Credit a user and grow the aggregates
 * - recordWithdrawal(): Debit a user and count the withdrawal
 * - balanceOf() / balancesOf() / totals(): Pure reads
 * - atomically(): Roll back every mutation made by a failed unit of work
 * - snapshot() / fromSnapshot(): Serialize and restore
 *
 * Users are keyed case-insensitively. A balance that returns to zero is
 * dropped from the table.
 */

import { assetKey, isAddress, isAssetId } from "@strongroom/types";
import type { Address, AssetId } from "@strongroom/types";
import type {
  AssetBalance,
  LedgerSnapshot,
  LedgerTotals,
  SnapshotBalance,
} from "./types.js";
import { LedgerError } from "./types.js";

interface BalanceCell {
  readonly user: Address;
  readonly asset: AssetId;
  amount: bigint;
}

interface LedgerState {
  readonly balances: Map<string, Map<string, BalanceCell>>;
  totalDeposits: bigint;
  depositCount: bigint;
  withdrawalCount: bigint;
}

export class VaultLedger {
  private _state: LedgerState = {
    balances: new Map(),
    totalDeposits: 0n,
    depositCount: 0n,
    withdrawalCount: 0n,
  };

  // ─── Mutations ───────────────────────────────────────────────────────

  /**
   * Credit `amount` of `asset` to `user` and add `stableValue` to the
   * deposit total.
   */
  recordDeposit(user: Address, asset: AssetId, amount: bigint, stableValue: bigint): void {
    assertPositive(amount, "Deposit amount");
    if (stableValue < 0n) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Stable value must not be negative, got ${stableValue.toString()}`,
      );
    }

    const cell = this._cell(user, asset);
    cell.amount += amount;
    this._state.depositCount += 1n;
    this._state.totalDeposits += stableValue;
  }

  /**
   * Debit `amount` of `asset` from `user`.
   * Never clamps: an amount above the balance is rejected.
   */
  recordWithdrawal(user: Address, asset: AssetId, amount: bigint): void {
    assertPositive(amount, "Withdrawal amount");

    const balance = this.balanceOf(user, asset);
    if (amount > balance) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Cannot withdraw ${amount.toString()} of ${assetKey(asset)}: balance is ${balance.toString()}`,
      );
    }

    const userKey = user.toLowerCase();
    const key = assetKey(asset);
    const cell = this._cell(user, asset);
    cell.amount -= amount;
    if (cell.amount === 0n) {
      const row = this._state.balances.get(userKey);
      row?.delete(key);
      if (row !== undefined && row.size === 0) {
        this._state.balances.delete(userKey);
      }
    }
    this._state.withdrawalCount += 1n;
  }

  /**
   * Run `fn`. If it throws or rejects, restore the balance table and the
   * counters to their state before the call, then rethrow.
   */
  async atomically<T>(fn: () => Promise<T> | T): Promise<T> {
    const saved = cloneState(this._state);
    try {
      return await fn();
    } catch (err) {
      this._state = saved;
      throw err;
    }
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  balanceOf(user: Address, asset: AssetId): bigint {
    return this._state.balances.get(user.toLowerCase())?.get(assetKey(asset))?.amount ?? 0n;
  }

  /**
   * Every non-zero balance held by `user`, native first.
   */
  balancesOf(user: Address): readonly AssetBalance[] {
    const row = this._state.balances.get(user.toLowerCase());
    if (row === undefined) {
      return [];
    }
    return [...row.values()]
      .map((cell) => ({ asset: cell.asset, amount: cell.amount }))
      .sort((a, b) => assetKey(a.asset).localeCompare(assetKey(b.asset)));
  }

  totals(): LedgerTotals {
    return {
      totalDeposits: this._state.totalDeposits,
      depositCount: this._state.depositCount,
      withdrawalCount: this._state.withdrawalCount,
    };
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  /**
   * Create a serializable snapshot of the ledger.
   * Can be restored with VaultLedger.fromSnapshot().
   */
  snapshot(): LedgerSnapshot {
    const balances: SnapshotBalance[] = [];
    for (const row of this._state.balances.values()) {
      for (const cell of row.values()) {
        balances.push({ user: cell.user, asset: cell.asset, amount: cell.amount.toString() });
      }
    }

    return {
      version: 1,
      balances,
      totalDeposits: this._state.totalDeposits.toString(),
      depositCount: this._state.depositCount.toString(),
      withdrawalCount: this._state.withdrawalCount.toString(),
      createdAt: new Date().toISOString(),
    };
  }

  /**
   * Restore a ledger from a snapshot.
   * Every field is validated; a malformed snapshot throws INVALID_SNAPSHOT.
   */
  static fromSnapshot(snapshot: LedgerSnapshot): VaultLedger {
    if (snapshot.version !== 1) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Unsupported snapshot version: ${String(snapshot.version)}`,
      );
    }

    const ledger = new VaultLedger();
    const state = ledger._state;
    state.totalDeposits = parseCounter(snapshot.totalDeposits, "totalDeposits");
    state.depositCount = parseCounter(snapshot.depositCount, "depositCount");
    state.withdrawalCount = parseCounter(snapshot.withdrawalCount, "withdrawalCount");

    for (const entry of snapshot.balances) {
      if (!isAddress(entry.user) || !isAssetId(entry.asset)) {
        throw new LedgerError("INVALID_SNAPSHOT", "Snapshot balance has an invalid user or asset");
      }
      const amount = parseCounter(entry.amount, "balance");
      if (amount === 0n) {
        continue;
      }
      const cell = ledger._cell(entry.user, entry.asset);
      if (cell.amount !== 0n) {
        throw new LedgerError(
          "INVALID_SNAPSHOT",
          `Duplicate balance for ${entry.user} / ${assetKey(entry.asset)}`,
        );
      }
      cell.amount = amount;
    }

    return ledger;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _cell(user: Address, asset: AssetId): BalanceCell {
    const userKey = user.toLowerCase();
    let row = this._state.balances.get(userKey);
    if (row === undefined) {
      row = new Map();
      this._state.balances.set(userKey, row);
    }

    const key = assetKey(asset);
    let cell = row.get(key);
    if (cell === undefined) {
      cell = { user, asset, amount: 0n };
      row.set(key, cell);
    }
    return cell;
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────

function assertPositive(amount: bigint, label: string): void {
  if (amount <= 0n) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${label} must be positive, got ${amount.toString()}`,
    );
  }
}

function parseCounter(value: string, field: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new LedgerError(
      "INVALID_SNAPSHOT",
      `Snapshot field "${field}" is not a non-negative integer: "${value}"`,
    );
  }
  return BigInt(value);
}

function cloneState(state: LedgerState): LedgerState {
  const balances = new Map<string, Map<string, BalanceCell>>();
  for (const [userKey, row] of state.balances) {
    const copy = new Map<string, BalanceCell>();
    for (const [key, cell] of row) {
      copy.set(key, { ...cell });
    }
    balances.set(userKey, copy);
  }
  return {
    balances,
    totalDeposits: state.totalDeposits,
    depositCount: state.depositCount,
    withdrawalCount: state.withdrawalCount,
  };
}
