import type { Address, CreateSaleParams } from "./types";

type SaleOverrides = Partial<Omit<CreateSaleParams, "assetAddress" | "disbursement">>;

const DEFAULTS = {
  priceInUsd: 1_000_000n,
  maxTokensToSell: 0n,
  startDate: 0,
  endDate: 0,
  paused: false,
} satisfies SaleOverrides;

/**
 * Custody sale: the desk holds the inventory and transfers it out on purchase.
 * Open-ended, unpaused, $1.00 per unit unless overridden.
 */
export function transferSale(assetAddress: Address, overrides: SaleOverrides = {}): CreateSaleParams {
  return { ...DEFAULTS, ...overrides, assetAddress, disbursement: { method: "transfer" } };
}

/**
 * Treasury sale: inventory stays with `source`, which has approved the desk
 * as spender.
 */
export function transferFromSale(
  assetAddress: Address,
  source: Address,
  overrides: SaleOverrides = {}
): CreateSaleParams {
  return { ...DEFAULTS, ...overrides, assetAddress, disbursement: { method: "transferFrom", source } };
}

/**
 * Mint-on-demand sale: the asset grants the desk mint rights.
 */
export function mintSale(assetAddress: Address, overrides: SaleOverrides = {}): CreateSaleParams {
  return { ...DEFAULTS, ...overrides, assetAddress, disbursement: { method: "mint" } };
}
