/**
 * Example 2: Paying in Native Currency
 * ====================================
 *
 * WHAT:  Buy with native currency priced through a USD oracle feed.
 * WHEN:  Buyers hold the chain's native currency rather than stablecoins.
 * WHY:   The desk converts the attached payment at the feed's rate, truncating
 *        at each step, and forwards the whole payment to the administrator.
 *
 * Run: npx tsx examples/2-native-sale.ts
 */

import {
  ASSET_UNIT,
  LocalChain,
  OracleError,
  SaleDesk,
  createLogger,
  formatDecimal,
  transferSale,
} from "../sdk/core/src";

function main() {
  const chain = new LocalChain();
  const admin = chain.createAccount();
  const buyer = chain.createAccount();
  const asset = chain.deployToken({ name: "Example Asset", symbol: "EXA", decimals: 18 });

  // ── Step 1: A feed quoting $2,000.00 per native unit (8 decimals) ────
  const feed = chain.deployPriceFeed(200_000_000_000n);

  const desk = new SaleDesk({
    runtime: chain,
    address: chain.createAccount(),
    owner: admin,
    priceFeed: feed.address,
    logger: createLogger({ level: "warn" }),
  });

  // ── Step 2: $1.50 per unit, unbounded ────────────────────────────────
  const index = desk.createSale(admin, transferSale(asset.address, { priceInUsd: 1_500_000n }));
  asset.faucet(desk.address, 1_000n * ASSET_UNIT);
  chain.setNativeBalance(buyer, 5n * ASSET_UNIT);

  // ── Step 3: Quote, then buy with 0.1 native ──────────────────────────
  const payment = ASSET_UNIT / 10n;
  const quote = desk.quoteNative(index, payment);
  console.log(`0.1 native is worth $${formatDecimal(quote.usdValue, 18)}, buys ${formatDecimal(quote.amountToBuy, 18)} EXA`);

  const receipt = desk.buyWithNative(buyer, index, payment);
  console.log(`Bought ${formatDecimal(receipt.amountBought, 18)} EXA`);
  console.log(`Admin received ${formatDecimal(chain.nativeBalanceOf(admin), 18)} native`);

  // ── Step 4: A broken feed stops native purchases, nothing else ───────
  feed.setAnswer(0n);
  try {
    desk.buyWithNative(buyer, index, payment);
  } catch (err) {
    if (err instanceof OracleError) console.log(`Oracle refused: ${err.message}`);
  }
  console.log(`Buyer still holds ${formatDecimal(chain.nativeBalanceOf(buyer), 18)} native`);
}

main();
