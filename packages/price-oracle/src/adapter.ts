/**
 * Price Oracle Adapter
 *
 * Wraps a PriceFeed with the two validity checks the vault depends on
 * and converts volatile-asset amounts into the stable accounting unit.
 *
 *   price  = feed.latestRoundData().answer          (8 decimals)
 *   stable = amount * price / 10^(18 + 8 - 6)       (floor)
 *
 * The feed is read on every call. Truncated value is not tracked.
 */

import { NATIVE_DECIMALS, STABLE_DECIMALS } from "@strongroom/types";
import type { Address } from "@strongroom/types";
import { FEED_DECIMALS, OracleError } from "./types.js";
import type { PriceFeed } from "./types.js";

/** Maximum tolerated age of a price update, in seconds. */
export const DEFAULT_HEARTBEAT_SECONDS = 3600;

/**
 * Reconciles wei (18), the feed's precision (8) and the stable unit (6).
 */
export const SCALING_FACTOR = 10n ** BigInt(NATIVE_DECIMALS + FEED_DECIMALS - STABLE_DECIMALS);

export type Clock = () => number;

export interface OracleAdapterOptions {
  readonly heartbeatSeconds?: number | undefined;
  /** Current time in whole Unix seconds */
  readonly clock?: Clock | undefined;
}

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export class PriceOracleAdapter {
  private feed: PriceFeed;
  readonly heartbeatSeconds: number;
  private readonly clock: Clock;

  constructor(feed: PriceFeed, options: OracleAdapterOptions = {}) {
    this.feed = feed;
    this.heartbeatSeconds = options.heartbeatSeconds ?? DEFAULT_HEARTBEAT_SECONDS;
    this.clock = options.clock ?? systemClock;
  }

  get reference(): Address {
    return this.feed.reference;
  }

  /**
   * Point the adapter at a different feed. Takes effect on the next read.
   */
  setFeed(feed: PriceFeed): void {
    this.feed = feed;
  }

  /**
   * Read and validate the current price of one volatile unit.
   *
   * @throws OracleError ORACLE_COMPROMISED when the answer is zero or negative
   * @throws OracleError ORACLE_STALE when the last update is older than the heartbeat
   */
  async currentVolatileAssetPrice(): Promise<bigint> {
    const round = await this.readRound();

    if (round.answer <= 0n) {
      throw new OracleError("ORACLE_COMPROMISED", "Oracle reported a non-positive price", {
        details: { price: round.answer.toString(), feed: this.feed.reference },
      });
    }

    const ageSeconds = BigInt(this.clock()) - round.updatedAt;
    if (ageSeconds > BigInt(this.heartbeatSeconds)) {
      throw new OracleError("ORACLE_STALE", "Oracle price is stale", {
        details: {
          ageSeconds: ageSeconds.toString(),
          heartbeatSeconds: this.heartbeatSeconds,
          feed: this.feed.reference,
        },
      });
    }

    return round.answer;
  }

  /**
   * Convert wei into stable smallest units at the current price (floor).
   */
  async convertVolatileToStable(amount: bigint): Promise<bigint> {
    const price = await this.currentVolatileAssetPrice();
    return (amount * price) / SCALING_FACTOR;
  }

  private async readRound() {
    try {
      return await this.feed.latestRoundData();
    } catch (err) {
      throw new OracleError("ORACLE_UNAVAILABLE", "Price feed read failed", {
        cause: err,
        details: { feed: this.feed.reference },
      });
    }
  }
}
