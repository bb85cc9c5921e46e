/**
 * Price Feed Types
 *
 * The read contract of an external price feed (AggregatorV3-style).
 * Only `answer` and `updatedAt` are consumed by the adapter; the rest
 * of the round is carried for diagnostics.
 *
 * Rules:
 * - All methods are read-only, with no mutations, no signing
 * - Feeds are read on every use (no caching of rounds)
 * - Errors are thrown, not returned (fail-closed)
 */

import type { Address } from "@strongroom/types";

/** Decimals of the price answer reported by the feed. */
export const FEED_DECIMALS = 8;

/**
 * A single price round as reported by `latestRoundData()`.
 */
export interface RoundData {
  readonly roundId: bigint;
  /** Price of one volatile unit in the feed's quote currency, 8 decimals */
  readonly answer: bigint;
  readonly startedAt: bigint;
  /** Unix seconds of the last update */
  readonly updatedAt: bigint;
  readonly answeredInRound: bigint;
}

/**
 * A price source the adapter can read.
 */
export interface PriceFeed {
  /** Address/handle of the feed (reported in events and errors) */
  readonly reference: Address;

  latestRoundData(): Promise<RoundData>;
}

// =============================================================================
// Errors
// =============================================================================

export type OracleErrorCode =
  | "ORACLE_COMPROMISED"
  | "ORACLE_STALE"
  | "ORACLE_UNAVAILABLE";

/**
 * Structured error from the oracle adapter.
 */
export class OracleError extends Error {
  readonly code: OracleErrorCode;
  readonly details?: Readonly<Record<string, unknown>>;

  constructor(
    code: OracleErrorCode,
    message: string,
    options?: { cause?: unknown; details?: Readonly<Record<string, unknown>> },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "OracleError";
    this.code = code;
    if (options?.details !== undefined) {
      this.details = options.details;
    }
  }
}
