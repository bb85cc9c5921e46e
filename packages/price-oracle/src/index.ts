/**
 * @strongroom/price-oracle: Price Oracle Adapter.
 *
 * Validates freshness and sanity of an external price feed and converts
 * the volatile asset's smallest unit into the stable accounting unit.
 *
 * Feeds:
 * - ChainlinkPriceFeed: AggregatorV3 over JSON-RPC (viem)
 * - ManualPriceFeed: in-process, owner-set rounds
 */

export {
  PriceOracleAdapter,
  DEFAULT_HEARTBEAT_SECONDS,
  SCALING_FACTOR,
  systemClock,
} from "./adapter.js";
export type { Clock, OracleAdapterOptions } from "./adapter.js";

export { ChainlinkPriceFeed, AGGREGATOR_V3_ABI } from "./chainlink-feed.js";
export type { ChainlinkFeedConfig } from "./chainlink-feed.js";

export { ManualPriceFeed } from "./manual-feed.js";
export type { ManualPriceFeedOptions } from "./manual-feed.js";

export { FEED_DECIMALS, OracleError } from "./types.js";
export type { PriceFeed, RoundData, OracleErrorCode } from "./types.js";
