import {
  ASSET_UNIT,
  LocalChain,
  LocalPriceFeed,
  LocalToken,
  SaleDesk,
  createLogger,
  type Address,
  type SaleEvent,
} from "../sdk/core/src";

export const silentLogger = createLogger({ level: "silent" });

/** $2000.00 with 8 decimals. */
export const NATIVE_USD_RATE = 200_000_000_000n;

export interface DeskFixture {
  chain: LocalChain;
  desk: SaleDesk;
  owner: Address;
  buyer: Address;
  stranger: Address;
  usdA: LocalToken;
  usdB: LocalToken;
  asset: LocalToken;
  feed: LocalPriceFeed;
  events: SaleEvent[];
}

/**
 * Desk with two 6-decimal stablecoins, an 18-decimal asset and a native/USD
 * feed at NATIVE_USD_RATE. The buyer holds $1,000 of each stablecoin and
 * 10 native units; nothing is approved yet.
 */
export function setupDesk(): DeskFixture {
  const chain = new LocalChain();
  const owner = chain.createAccount();
  const buyer = chain.createAccount();
  const stranger = chain.createAccount();
  const deskAddress = chain.createAccount();

  const usdA = chain.deployToken({ name: "Test Dollar A", symbol: "TUSDA", decimals: 6 });
  const usdB = chain.deployToken({ name: "Test Dollar B", symbol: "TUSDB", decimals: 6 });
  const asset = chain.deployToken({ name: "Sale Asset", symbol: "SALE", decimals: 18, mintable: true });
  const feed = chain.deployPriceFeed(NATIVE_USD_RATE);

  const desk = new SaleDesk({
    runtime: chain,
    address: deskAddress,
    owner,
    stablecoins: { A: usdA.address, B: usdB.address },
    priceFeed: feed.address,
    logger: silentLogger,
  });

  usdA.faucet(buyer, 1_000_000_000n);
  usdB.faucet(buyer, 1_000_000_000n);
  chain.setNativeBalance(buyer, 10n * ASSET_UNIT);

  const events: SaleEvent[] = [];
  desk.onEvent((event) => events.push(event));

  return { chain, desk, owner, buyer, stranger, usdA, usdB, asset, feed, events };
}

/** Fund the desk's custody with `amount` of the asset. */
export function stock(fx: DeskFixture, amount: bigint): void {
  fx.asset.faucet(fx.desk.address, amount);
}

export function units(whole: bigint): bigint {
  return whole * ASSET_UNIT;
}
