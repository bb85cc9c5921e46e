/**
 * Transfer/Settlement Shim
 *
 * The only place the vault moves real value. Deposits are collected
 * into the vault account and withdrawals paid out of it, over one of
 * two rails:
 *
 * - NativeAssetRail: value transfer of the chain-native asset
 * - StableToken: an ERC-20-style token (transfer / transferFrom)
 *
 * Rules:
 * - A rail returning false, or throwing, is a SETTLEMENT_FAILED
 * - The underlying error is kept as `cause`
 * - Callers apply ledger effects before calling in (effects, then
 *   interactions) and roll them back when settlement fails
 */

import { assetKey } from "@strongroom/types";
import type { Address, AssetId } from "@strongroom/types";
import { VaultError } from "./errors.js";

// =============================================================================
// Rails
// =============================================================================

export interface NativeAssetRail {
  balanceOf(account: Address): Promise<bigint>;
  transfer(from: Address, to: Address, amount: bigint): Promise<boolean>;
}

export interface StableToken {
  readonly address: Address;
  balanceOf(account: Address): Promise<bigint>;
  transfer(from: Address, to: Address, amount: bigint): Promise<boolean>;
  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): Promise<boolean>;
}

// =============================================================================
// Shim
// =============================================================================

export class SettlementShim {
  readonly vaultAddress: Address;
  private readonly nativeRail: NativeAssetRail;
  private readonly stableToken: StableToken;

  constructor(vaultAddress: Address, nativeRail: NativeAssetRail, stableToken: StableToken) {
    this.vaultAddress = vaultAddress;
    this.nativeRail = nativeRail;
    this.stableToken = stableToken;
  }

  /**
   * Pull a deposit from `user` into the vault.
   */
  async collect(user: Address, asset: AssetId, amount: bigint): Promise<void> {
    await this.settle("collect", user, asset, amount, () =>
      asset.kind === "native"
        ? this.nativeRail.transfer(user, this.vaultAddress, amount)
        : this.stableToken.transferFrom(this.vaultAddress, user, this.vaultAddress, amount),
    );
  }

  /**
   * Send a withdrawal from the vault to `user`.
   */
  async pay(user: Address, asset: AssetId, amount: bigint): Promise<void> {
    await this.settle("pay", user, asset, amount, () =>
      asset.kind === "native"
        ? this.nativeRail.transfer(this.vaultAddress, user, amount)
        : this.stableToken.transfer(this.vaultAddress, user, amount),
    );
  }

  /**
   * What the vault actually holds of `asset`.
   */
  async onHand(asset: AssetId): Promise<bigint> {
    return asset.kind === "native"
      ? this.nativeRail.balanceOf(this.vaultAddress)
      : this.stableToken.balanceOf(this.vaultAddress);
  }

  private async settle(
    direction: "collect" | "pay",
    user: Address,
    asset: AssetId,
    amount: bigint,
    transfer: () => Promise<boolean>,
  ): Promise<void> {
    const details = { direction, user, asset: assetKey(asset), amount: amount.toString() };

    let ok: boolean;
    try {
      ok = await transfer();
    } catch (err) {
      throw new VaultError("SETTLEMENT_FAILED", `Settlement ${direction} failed`, {
        cause: err,
        details,
      });
    }

    if (!ok) {
      throw new VaultError("SETTLEMENT_FAILED", `Settlement ${direction} was refused`, {
        details,
      });
    }
  }
}
