/**
 * Price feed factories.
 *
 * The admin oracle route only receives a feed address. A FeedFactory
 * turns it into a PriceFeed: an on-chain aggregator when an RPC
 * endpoint is configured, an in-process manual feed otherwise.
 */

import type { Address } from "@strongroom/types";
import { ChainlinkPriceFeed, ManualPriceFeed } from "@strongroom/price-oracle";
import type { Clock, PriceFeed } from "@strongroom/price-oracle";

export type FeedFactory = (address: Address) => PriceFeed;

export function chainlinkFeedFactory(rpcUrl: string, timeoutMs: number): FeedFactory {
  return (address) => new ChainlinkPriceFeed({ address, rpcUrl, timeoutMs });
}

/**
 * Every feed it creates holds `price` and reports it as current on each
 * read, so a node without an RPC endpoint never sees a stale round.
 */
export function manualFeedFactory(price: bigint, clock: Clock): FeedFactory {
  return (address) =>
    new ManualPriceFeed({ reference: address, price, updatedAt: BigInt(clock()), clock });
}
