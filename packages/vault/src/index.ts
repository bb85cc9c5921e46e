/**
 * @strongroom/vault: Custodial multi-asset vault.
 *
 * Holds the chain-native asset and one stable token for its users,
 * values deposits through a freshness-checked price oracle and enforces
 * a per-withdrawal ceiling plus two aggregate capital ceilings.
 *
 * Design rules:
 * - Checks, then ledger effects, then settlement
 * - A failed settlement rolls the ledger back
 * - One operation at a time; re-entry fails immediately
 * - Every accepted operation appends exactly one audit event
 */

// Top-level vault
export { CustodialVault } from "./vault.js";

// Subsystems
export { AdminControl, DEFAULT_PER_WITHDRAWAL_CEILING } from "./admin.js";
export type { AdminControlOptions } from "./admin.js";
export { checkAmount, checkDeposit, checkWithdrawal, enforce } from "./limit-policy.js";
export type { PolicyDecision, DepositCheck, WithdrawalCheck } from "./limit-policy.js";
export { ReentrancyGuard } from "./reentrancy-guard.js";
export { SettlementShim } from "./settlement.js";
export type { NativeAssetRail, StableToken } from "./settlement.js";
export { InMemoryNativeRail, InMemoryStableToken } from "./in-memory-rails.js";
export type { ReceiveHook } from "./in-memory-rails.js";
export { buildVaultEvent } from "./events.js";
export type { EventContext } from "./events.js";

// Errors
export { VaultError, errorCode } from "./errors.js";
export type { VaultErrorCode } from "./errors.js";

// Types
export type {
  VaultCeilings,
  CustodialVaultConfig,
  OperationContext,
  VaultParameters,
  HeldValue,
  VaultSnapshot,
} from "./types.js";
