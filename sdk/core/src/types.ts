import type { Journal } from "./journal";

// ── Units ────────────────────────────────────────────────────────────

/** EIP-55 checksummed hex address. */
export type Address = string;

export const ASSET_DECIMALS = 18;
export const USD_DECIMALS = 6;
export const ORACLE_DECIMALS = 8;

export const ASSET_UNIT = 10n ** BigInt(ASSET_DECIMALS);
export const USD_UNIT = 10n ** BigInt(USD_DECIMALS);
export const ORACLE_UNIT = 10n ** BigInt(ORACLE_DECIMALS);

// ── Disbursement ─────────────────────────────────────────────────────

export type Disbursement =
  | { method: "transfer" }
  | { method: "transferFrom"; source: Address }
  | { method: "mint" };

export type DisbursementMethod = Disbursement["method"];

export const DISBURSEMENT_METHODS: readonly DisbursementMethod[] = [
  "transfer",
  "transferFrom",
  "mint",
];

// ── Sale records ─────────────────────────────────────────────────────

export interface Sale {
  index: number;
  assetAddress: Address;
  disbursement: Disbursement;
  priceInUsd: bigint;
  maxTokensToSell: bigint;
  tokensSold: bigint;
  startDate: number;
  endDate: number;
  paused: boolean;
}

export interface CreateSaleParams {
  assetAddress: Address;
  priceInUsd: bigint;
  maxTokensToSell: bigint;
  startDate: number;
  endDate: number;
  paused: boolean;
  disbursement: Disbursement;
}

/** Fields an administrator may change on an existing sale. */
export type SalePatch = Partial<Pick<Sale, "priceInUsd" | "maxTokensToSell" | "startDate" | "endDate" | "assetAddress" | "paused">>;

export type StableSlot = "A" | "B";

// ── Collaborator interfaces ──────────────────────────────────────────

export interface Erc20Token {
  readonly address: Address;
  balanceOf(owner: Address): bigint;
  allowance(owner: Address, spender: Address): bigint;
  approve(caller: Address, spender: Address, amount: bigint): boolean;
  transfer(caller: Address, to: Address, amount: bigint): boolean;
  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): boolean;
}

export interface MintEntrypoint {
  mint(caller: Address, recipient: Address, amount: bigint): boolean;
}

export interface RoundData {
  answer: bigint;
  updatedAt: number;
}

export interface PriceFeed {
  latestAnswer(): RoundData;
}

/**
 * Everything the sale system needs from its host: address resolution for
 * collaborators, native balances, the clock and the shared undo journal.
 */
export interface SaleRuntime {
  readonly journal: Journal;
  now(): number;
  token(address: Address): Erc20Token;
  minter(address: Address): MintEntrypoint;
  priceFeed(address: Address): PriceFeed;
  nativeBalanceOf(owner: Address): bigint;
  transferNative(from: Address, to: Address, amount: bigint): boolean;
}

// ── Event Types ─────────────────────────────────────────────────────

export interface SaleRecordFields {
  index: number;
  assetAddress: Address;
  priceInUsd: bigint;
  maxTokensToSell: bigint;
  startDate: number;
  endDate: number;
  paused: boolean;
  disbursementMethod: DisbursementMethod;
  sourceAddress: Address;
}

export interface TokensBought {
  buyer: Address;
  index: number;
  amountBought: bigint;
  priceInUsd: bigint;
  usdCost: bigint;
  nativeSent: bigint;
  referralCode: string;
}

export type SaleEvent =
  | ({ type: "SaleCreated" } & SaleRecordFields)
  | ({ type: "SaleUpdated" } & SaleRecordFields)
  | ({ type: "TokensBought" } & TokensBought)
  | { type: "OwnershipTransferred"; previousOwner: Address; newOwner: Address }
  | { type: "StablecoinUpdated"; slot: StableSlot; address: Address }
  | { type: "PriceFeedUpdated"; address: Address }
  | { type: "ForeignAssetWithdrawn"; token: Address; amount: bigint; to: Address }
  | { type: "NativeWithdrawn"; amount: bigint; to: Address };

export type SaleEventType = SaleEvent["type"];

export type SaleEventListener = (event: SaleEvent) => void;

export type Emit = (event: SaleEvent) => void;
