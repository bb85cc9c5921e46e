/**
 * Faucet for the in-process rails.
 *
 * A node started without real rails has no way to put value in users'
 * hands. The faucet credits native value, or mints stable tokens and
 * raises the vault's allowance by the same amount, so the account can
 * deposit what it received.
 */

import type { Address } from "@strongroom/types";
import type { InMemoryNativeRail, InMemoryStableToken } from "@strongroom/vault";
import type { AssetName } from "../types/dto.js";

export class Faucet {
  constructor(
    private readonly rail: InMemoryNativeRail,
    private readonly token: InMemoryStableToken,
    private readonly vaultAddress: Address,
  ) {}

  drip(account: Address, asset: AssetName, amount: bigint): void {
    if (asset === "native") {
      this.rail.fund(account, amount);
      return;
    }
    this.token.mint(account, amount);
    this.token.approve(
      account,
      this.vaultAddress,
      this.token.allowance(account, this.vaultAddress) + amount,
    );
  }
}
