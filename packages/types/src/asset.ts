/**
 * Asset Types
 *
 * The vault holds exactly two kinds of asset:
 * - the chain-native volatile asset, keyed by the zero address
 * - one designated stable token, keyed by its contract address
 *
 * Rules:
 * - Addresses are 0x-prefixed 20-byte hex strings
 * - Address comparison is case-insensitive (checksums are presentation only)
 * - Amounts are bigints in the asset's smallest unit
 */

/**
 * A 0x-prefixed account or contract address.
 */
export type Address = `0x${string}`;

/** Decimals of the chain-native volatile asset (wei). */
export const NATIVE_DECIMALS = 18;

/** Decimals of the stable accounting unit. */
export const STABLE_DECIMALS = 6;

/**
 * The chain-native volatile asset.
 */
export interface NativeAsset {
  readonly kind: "native";
}

/**
 * The designated stable token.
 */
export interface StableAsset {
  readonly kind: "stable";
  /** ERC-20 contract address of the stable token */
  readonly token: Address;
}

/**
 * Ledger key for a balance entry. Discriminated by `kind`.
 */
export type AssetId = NativeAsset | StableAsset;

export type AssetKind = AssetId["kind"];

export const NATIVE_ASSET: NativeAsset = { kind: "native" };

export function stableAsset(token: Address): StableAsset {
  return { kind: "stable", token };
}

/**
 * Canonical string key for an asset ("native" or "stable:<address>").
 */
export function assetKey(asset: AssetId): string {
  return asset.kind === "native"
    ? "native"
    : `stable:${asset.token.toLowerCase()}`;
}

export function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
