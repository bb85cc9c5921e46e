/**
 * Manual price feed: an in-process feed whose round is set by its owner.
 *
 * Used for local runs without an RPC endpoint and as the feed in tests.
 * Every update advances the round id and stamps `updatedAt`. Given a
 * clock, the feed restamps its answer on each read.
 */

import type { Address } from "@strongroom/types";
import type { Clock } from "./adapter.js";
import type { PriceFeed, RoundData } from "./types.js";

export interface ManualPriceFeedOptions {
  readonly reference: Address;
  /** Initial answer (8 decimals) */
  readonly price: bigint;
  /** Initial update time in Unix seconds */
  readonly updatedAt: bigint;
  /**
   * Republish the current answer at `clock()` on every read. The price
   * then only changes through setPrice/setRound and never goes stale.
   */
  readonly clock?: Clock | undefined;
}

export class ManualPriceFeed implements PriceFeed {
  readonly reference: Address;
  private round: RoundData;
  private reads = 0;
  private readonly clock: Clock | undefined;

  constructor(options: ManualPriceFeedOptions) {
    this.reference = options.reference;
    this.clock = options.clock;
    this.round = {
      roundId: 1n,
      answer: options.price,
      startedAt: options.updatedAt,
      updatedAt: options.updatedAt,
      answeredInRound: 1n,
    };
  }

  async latestRoundData(): Promise<RoundData> {
    this.reads++;
    if (this.clock !== undefined) {
      const now = BigInt(this.clock());
      if (now > this.round.updatedAt) {
        this.setPrice(this.round.answer, now);
      }
    }
    return this.round;
  }

  /**
   * Publish a new answer as the next round.
   */
  setPrice(price: bigint, updatedAt: bigint): RoundData {
    const roundId = this.round.roundId + 1n;
    return this.setRound({
      roundId,
      answer: price,
      startedAt: updatedAt,
      updatedAt,
      answeredInRound: roundId,
    });
  }

  setRound(round: RoundData): RoundData {
    this.round = round;
    return round;
  }

  /** Number of times the round has been read. */
  get readCount(): number {
    return this.reads;
  }
}
