/**
 * Chainlink price feed: reads an AggregatorV3 contract over JSON-RPC.
 *
 * Uses viem for all chain interactions. Read-only:
 * - No signing
 * - No transaction submission
 * - No state modification
 */

import { createPublicClient, http, parseAbi, type PublicClient } from "viem";
import type { Address } from "@strongroom/types";
import type { PriceFeed, RoundData } from "./types.js";

export const AGGREGATOR_V3_ABI = parseAbi([
  "function latestRoundData() view returns (uint80 roundId, int256 answer, uint256 startedAt, uint256 updatedAt, uint80 answeredInRound)",
  "function decimals() view returns (uint8)",
]);

export interface ChainlinkFeedConfig {
  /** AggregatorV3 contract address */
  readonly address: Address;

  /** JSON-RPC endpoint (ignored when `client` is given) */
  readonly rpcUrl?: string;

  /** Optional request timeout in milliseconds */
  readonly timeoutMs?: number;

  /** Pre-built client; tests pass one backed by a custom transport */
  readonly client?: PublicClient;
}

export class ChainlinkPriceFeed implements PriceFeed {
  readonly reference: Address;
  private readonly client: PublicClient;

  constructor(config: ChainlinkFeedConfig) {
    this.reference = config.address;
    if (config.client !== undefined) {
      this.client = config.client;
    } else if (config.rpcUrl !== undefined) {
      this.client = createPublicClient({
        transport: http(config.rpcUrl, { timeout: config.timeoutMs ?? 30_000 }),
      });
    } else {
      throw new Error(
        `ChainlinkPriceFeed: either rpcUrl or client is required for feed '${config.address}'`,
      );
    }
  }

  async latestRoundData(): Promise<RoundData> {
    const [roundId, answer, startedAt, updatedAt, answeredInRound] =
      await this.client.readContract({
        address: this.reference,
        abi: AGGREGATOR_V3_ABI,
        functionName: "latestRoundData",
      });

    return { roundId, answer, startedAt, updatedAt, answeredInRound };
  }

  async decimals(): Promise<number> {
    return this.client.readContract({
      address: this.reference,
      abi: AGGREGATOR_V3_ABI,
      functionName: "decimals",
    });
  }
}
