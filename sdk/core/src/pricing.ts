import { ASSET_UNIT, ORACLE_UNIT, USD_UNIT } from "./types";

/**
 * USD cost (6 decimals) of `amountToBuy` asset units (18 decimals) at a
 * 6-decimal unit price. Truncates.
 */
export function stableCost(amountToBuy: bigint, priceInUsd: bigint): bigint {
  return (amountToBuy * priceInUsd) / ASSET_UNIT;
}

export interface NativeQuote {
  rate: bigint;
  usdValue: bigint;
  amountToBuy: bigint;
}

/**
 * Asset units bought with `nativeSent` at an 8-decimal USD rate and a
 * 6-decimal unit price. Both divisions truncate, in this order.
 */
export function nativeQuote(nativeSent: bigint, rate: bigint, priceInUsd: bigint): NativeQuote {
  const usdValue = (nativeSent * rate) / ORACLE_UNIT;
  const amountToBuy = (usdValue * USD_UNIT) / priceInUsd;
  return { rate, usdValue, amountToBuy };
}

/** Headroom under the cap, or undefined when the sale is unbounded. */
export function remainingCapacity(maxTokensToSell: bigint, tokensSold: bigint): bigint | undefined {
  if (maxTokensToSell === 0n) return undefined;
  return maxTokensToSell - tokensSold;
}
