/**
 * @strongroom/ledger: Vault balance table and amount math.
 *
 * Tracks what every user is owed per asset, plus the aggregate deposit
 * total and operation counters the limit policy reads.
 *
 * Design rules:
 * - All monetary arithmetic uses bigint (no floating point)
 * - Mutations are all-or-nothing
 * - Fail-closed: invalid amounts throw, never silently succeed
 * - Zero runtime dependencies beyond @strongroom/types
 */

export { VaultLedger } from "./vault-ledger.js";

export { parseAmount, formatAmount, parseUnits } from "./money-math.js";

export type {
  AssetBalance,
  LedgerTotals,
  SnapshotBalance,
  LedgerSnapshot,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
