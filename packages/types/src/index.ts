/**
 * @strongroom/types: Shared domain types for the Strongroom stack.
 *
 * These types are used across all Strongroom packages:
 * - Addresses and the two-variant asset identifier
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Asset types
export type {
  Address,
  AssetId,
  AssetKind,
  NativeAsset,
  StableAsset,
} from "./asset.js";
export {
  NATIVE_ASSET,
  NATIVE_DECIMALS,
  STABLE_DECIMALS,
  stableAsset,
  assetKey,
  sameAddress,
} from "./asset.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isAddress,
  isAssetId,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
