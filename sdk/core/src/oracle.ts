import { OracleError, isSaleDeskError } from "./errors";
import type { Address, RoundData, SaleRuntime } from "./types";
import { ZERO_ADDRESS, isZeroAddress } from "./utils";

export interface PriceOracleOptions {
  feed?: Address;
  /** Reject answers older than this many seconds; 0 disables the check. */
  maxAge?: number;
}

/**
 * Reads the native-currency/USD rate (8 decimals) from the configured feed.
 */
export class PriceOracleAdapter {
  feed: Address;
  readonly maxAge: number;

  constructor(
    private readonly runtime: SaleRuntime,
    options: PriceOracleOptions = {}
  ) {
    this.feed = options.feed ?? ZERO_ADDRESS;
    this.maxAge = options.maxAge ?? 0;
  }

  latestUsdPerNative(): bigint {
    if (isZeroAddress(this.feed)) throw new OracleError("No price feed configured");

    let round: RoundData;
    try {
      round = this.runtime.priceFeed(this.feed).latestAnswer();
    } catch (err) {
      if (isSaleDeskError(err)) throw err;
      throw new OracleError(`Price feed ${this.feed} is unavailable`, { cause: err });
    }

    if (round.answer <= 0n) {
      throw new OracleError(`Price feed returned a non-positive answer: ${round.answer}`);
    }
    if (this.maxAge > 0 && this.runtime.now() - round.updatedAt > this.maxAge) {
      throw new OracleError(`Price feed answer is stale (updated at ${round.updatedAt})`);
    }
    return round.answer;
  }
}
