/**
 * Shared fixtures for vault tests: addresses, rails and a ready vault.
 */

import { InMemoryEventStore } from "@strongroom/event-store";
import { ManualPriceFeed } from "@strongroom/price-oracle";
import type { Address } from "@strongroom/types";
import { InMemoryNativeRail, InMemoryStableToken } from "../src/in-memory-rails.js";
import { CustodialVault } from "../src/vault.js";
import type { CustodialVaultConfig } from "../src/types.js";

export const ADMIN: Address = "0x00000000000000000000000000000000000000ad";
export const VAULT: Address = "0x000000000000000000000000000000000000c0de";
export const ALICE: Address = "0x00000000000000000000000000000000000000a1";
export const BOB: Address = "0x00000000000000000000000000000000000000b2";
export const TOKEN: Address = "0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48";
export const FEED: Address = "0x5f4eC3Df9cbd43714FE2740f5E3616155c5b8419";
export const OTHER_FEED: Address = "0x0000000000000000000000000000000000000fee";

export const NOW = 1_700_000_000;
export const ONE_ETHER = 10n ** 18n;
/** 2000 units at 8 decimals */
export const PRICE = 2000n * 10n ** 8n;
/** 1,000,000 stable units at 6 decimals */
export const MILLION_STABLE = 1_000_000n * 10n ** 6n;

export interface Harness {
  vault: CustodialVault;
  rail: InMemoryNativeRail;
  token: InMemoryStableToken;
  feed: ManualPriceFeed;
  store: InMemoryEventStore;
  clock: { now: number };
}

export function createHarness(overrides: Partial<CustodialVaultConfig> = {}): Harness {
  const rail = new InMemoryNativeRail();
  const token = new InMemoryStableToken(TOKEN);
  const feed = new ManualPriceFeed({ reference: FEED, price: PRICE, updatedAt: BigInt(NOW) });
  const store = new InMemoryEventStore();
  const clock = { now: NOW };

  const vault = new CustodialVault({
    admin: ADMIN,
    vaultAddress: VAULT,
    stableToken: token,
    feed,
    nativeRail: rail,
    ceilings: { bankCapital: MILLION_STABLE, globalDeposit: MILLION_STABLE },
    clock: () => clock.now,
    eventStore: store,
    ...overrides,
  });

  return { vault, rail, token, feed, store, clock };
}

/** Give `user` stable tokens and approve the vault to pull them. */
export function fundStable(h: Harness, user: Address, amount: bigint): void {
  h.token.mint(user, amount);
  h.token.approve(user, VAULT, amount);
}
