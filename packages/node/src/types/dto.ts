/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each request DTO has a Zod schema and a derived TypeScript type.
 * Response DTOs render bigints as decimal strings of smallest units,
 * alongside a human-readable formatted value where one exists.
 */

import { z } from "zod";
import { NATIVE_DECIMALS, STABLE_DECIMALS, assetKey, isAddress } from "@strongroom/types";
import type { Address, AssetId } from "@strongroom/types";
import { formatAmount } from "@strongroom/ledger";
import type { AssetBalance, LedgerTotals } from "@strongroom/ledger";
import type { HashedStoredEvent } from "@strongroom/event-store";
import type { HeldValue, VaultParameters } from "@strongroom/vault";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AddressSchema = z.custom<Address>(
  isAddress,
  "Expected a 0x-prefixed 20-byte hex address",
);

export const AssetNameSchema = z.enum(["native", "stable"]);

export type AssetName = z.infer<typeof AssetNameSchema>;

/** Positive-or-zero integer amount in smallest units, as a string. */
export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "Amount must be a non-negative integer string in smallest units")
  .transform((v) => BigInt(v));

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Operation DTOs
// =============================================================================

/** `user` may be omitted; when present it must name the caller. */
export const OperationSchema = z.object({
  user: AddressSchema.optional(),
  asset: AssetNameSchema,
  amount: AmountSchema,
});

export type OperationDto = z.infer<typeof OperationSchema>;

export const FaucetSchema = z.object({
  asset: AssetNameSchema,
  amount: AmountSchema,
});

// =============================================================================
// Admin DTOs
// =============================================================================

export const SetOracleSchema = z.object({
  address: AddressSchema,
});

export type SetOracleDto = z.infer<typeof SetOracleSchema>;

export const SetCeilingSchema = z.object({
  value: AmountSchema,
});

export type SetCeilingDto = z.infer<typeof SetCeilingSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

// =============================================================================
// Responses
// =============================================================================

export interface BalanceDto {
  readonly user: Address;
  readonly asset: AssetName;
  readonly assetId: string;
  readonly amount: string;
  readonly formatted: string;
}

export interface TotalsDto {
  readonly totalDeposits: string;
  readonly totalDepositsFormatted: string;
  readonly depositCount: string;
  readonly withdrawalCount: string;
}

export interface ParametersDto {
  readonly admin: Address;
  readonly bankCapitalCeiling: string;
  readonly globalDepositCeiling: string;
  readonly perWithdrawalCeiling: string;
}

export interface HoldingsDto {
  readonly nativeOnHand: string;
  readonly stableOnHand: string;
  readonly totalValue: string;
  readonly totalValueFormatted: string;
}

export interface EventDto {
  readonly type: string;
  readonly version: number;
  readonly globalPosition: number;
  readonly appendedAt: string;
  readonly hash: string;
  readonly previousHash: string;
  readonly metadata: HashedStoredEvent["event"]["metadata"];
  readonly payload: HashedStoredEvent["event"]["payload"];
}

export function assetName(asset: AssetId): AssetName {
  return asset.kind;
}

function decimalsOf(asset: AssetId): number {
  return asset.kind === "native" ? NATIVE_DECIMALS : STABLE_DECIMALS;
}

export function toBalanceDto(user: Address, balance: AssetBalance): BalanceDto {
  return {
    user,
    asset: assetName(balance.asset),
    assetId: assetKey(balance.asset),
    amount: balance.amount.toString(),
    formatted: formatAmount(balance.amount, decimalsOf(balance.asset)),
  };
}

export function toTotalsDto(totals: LedgerTotals): TotalsDto {
  return {
    totalDeposits: totals.totalDeposits.toString(),
    totalDepositsFormatted: formatAmount(totals.totalDeposits, STABLE_DECIMALS),
    depositCount: totals.depositCount.toString(),
    withdrawalCount: totals.withdrawalCount.toString(),
  };
}

export function toParametersDto(params: VaultParameters): ParametersDto {
  return {
    admin: params.admin,
    bankCapitalCeiling: params.bankCapitalCeiling.toString(),
    globalDepositCeiling: params.globalDepositCeiling.toString(),
    perWithdrawalCeiling: params.perWithdrawalCeiling.toString(),
  };
}

export function toHoldingsDto(held: HeldValue): HoldingsDto {
  return {
    nativeOnHand: held.nativeOnHand.toString(),
    stableOnHand: held.stableOnHand.toString(),
    totalValue: held.totalValue.toString(),
    totalValueFormatted: formatAmount(held.totalValue, STABLE_DECIMALS),
  };
}

export function toEventDto(stored: HashedStoredEvent): EventDto {
  return {
    type: stored.event.type,
    version: stored.version,
    globalPosition: stored.globalPosition,
    appendedAt: stored.appendedAt,
    hash: stored.hash,
    previousHash: stored.previousHash,
    metadata: stored.event.metadata,
    payload: stored.event.payload,
  };
}
