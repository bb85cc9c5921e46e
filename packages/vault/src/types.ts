/**
 * Vault Types
 *
 * Configuration, parameters and snapshots of the custodial vault.
 *
 * Rules:
 * - All types are readonly (immutability by default)
 * - Amounts are bigints in smallest units; snapshots carry decimal strings
 */

import type { Logger } from "pino";
import type { Address } from "@strongroom/types";
import type { EventStore } from "@strongroom/event-store";
import type { LedgerSnapshot } from "@strongroom/ledger";
import type { Clock, PriceFeed } from "@strongroom/price-oracle";
import type { NativeAssetRail, StableToken } from "./settlement.js";

// =============================================================================
// Configuration
// =============================================================================

export interface VaultCeilings {
  /** Cap on total deposits, in stable smallest units */
  readonly bankCapital: bigint;
  /** Cap on total deposits, in stable smallest units */
  readonly globalDeposit: bigint;
}

export interface CustodialVaultConfig {
  readonly admin: Address;
  /** The vault's own account on both rails */
  readonly vaultAddress: Address;
  readonly stableToken: StableToken;
  readonly feed: PriceFeed;
  readonly nativeRail: NativeAssetRail;
  readonly ceilings: VaultCeilings;
  /** Per-withdrawal cap in the withdrawn asset's units. Defaults to 10^18. */
  readonly perWithdrawalCeiling?: bigint | undefined;
  readonly heartbeatSeconds?: number | undefined;
  readonly clock?: Clock | undefined;
  /** Audit sink. An InMemoryEventStore is created when absent. */
  readonly eventStore?: EventStore | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Per-call context threaded into emitted events.
 */
export interface OperationContext {
  readonly correlationId?: string | undefined;
}

// =============================================================================
// Views
// =============================================================================

export interface VaultParameters {
  readonly admin: Address;
  readonly bankCapitalCeiling: bigint;
  readonly globalDepositCeiling: bigint;
  readonly perWithdrawalCeiling: bigint;
}

/**
 * Live solvency view: what the vault actually holds, valued in stable units.
 */
export interface HeldValue {
  readonly nativeOnHand: bigint;
  readonly stableOnHand: bigint;
  /** convert(nativeOnHand) + stableOnHand */
  readonly totalValue: bigint;
}

export interface VaultSnapshot {
  readonly version: 1;
  readonly vaultAddress: Address;
  readonly oracleReference: Address;
  readonly parameters: {
    readonly admin: Address;
    readonly bankCapitalCeiling: string;
    readonly globalDepositCeiling: string;
    readonly perWithdrawalCeiling: string;
  };
  readonly ledger: LedgerSnapshot;
}
