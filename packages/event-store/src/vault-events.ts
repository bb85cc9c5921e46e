/**
 * @strongroom/event-store: Vault Domain Event Definitions.
 *
 * The catalog of every event the custodial vault emits.
 *
 * Naming convention: `<subsystem>.<entity>.<action>`
 *
 * Payload amounts are decimal strings of the asset's smallest unit so
 * that events stay JSON-safe and hash deterministically.
 */

// =============================================================================
// Event Types
// =============================================================================

export const VAULT_EVENTS = {
  DEPOSIT_RECORDED: "vault.deposit.recorded",
  WITHDRAWAL_RECORDED: "vault.withdrawal.recorded",
  ORACLE_REFERENCE_CHANGED: "vault.oracle.changed",
  CEILING_CHANGED: "vault.ceiling.changed",
} as const;

export type VaultEventType = (typeof VAULT_EVENTS)[keyof typeof VAULT_EVENTS];

const VAULT_EVENT_TYPES = new Set<string>(Object.values(VAULT_EVENTS));

export function isVaultEventType(value: string): value is VaultEventType {
  return VAULT_EVENT_TYPES.has(value);
}

// =============================================================================
// Payloads
// =============================================================================

export type DepositRecordedPayload = {
  readonly user: string;
  /** "native" or "stable:<token>" */
  readonly assetId: string;
  /** Deposited amount in the asset's smallest unit */
  readonly amount: string;
  /** Amount added to total deposits, in stable smallest units */
  readonly stableValue: string;
};

export type WithdrawalRecordedPayload = {
  readonly user: string;
  readonly assetId: string;
  readonly amount: string;
};

export type OracleReferenceChangedPayload = {
  readonly newReference: string;
  readonly previousReference: string;
};

export type CeilingName = "bankCapital" | "globalDeposit";

export type CeilingChangedPayload = {
  readonly ceiling: CeilingName;
  readonly previousValue: string;
  readonly newValue: string;
};

/**
 * Payload shape per event type.
 */
export interface VaultEventPayloads {
  "vault.deposit.recorded": DepositRecordedPayload;
  "vault.withdrawal.recorded": WithdrawalRecordedPayload;
  "vault.oracle.changed": OracleReferenceChangedPayload;
  "vault.ceiling.changed": CeilingChangedPayload;
}
