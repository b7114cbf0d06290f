/**
 * Example 1: A Capped Stablecoin Sale
 * ===================================
 *
 * WHAT:  Sell an 18-decimal asset for a 6-decimal stablecoin out of the desk's
 *        own custody, with a supply cap.
 * WHEN:  The asset already exists and the seller can pre-fund the desk with
 *        everything that is for sale.
 * WHY:   Custody transfer is the simplest disbursement: the cap and the custody
 *        balance both bound what buyers can take.
 *
 * Run: npx tsx examples/1-stablecoin-sale.ts
 */

import { ASSET_UNIT, LocalChain, SaleDesk, createLogger, formatDecimal, transferSale } from "../sdk/core/src";

function main() {
  // ── Step 1: Stand up an in-process chain ─────────────────────────────
  // LocalChain implements the token, price feed and native-currency
  // interfaces the desk talks to, entirely in memory.
  const chain = new LocalChain();
  const admin = chain.createAccount();
  const buyer = chain.createAccount();

  const usdc = chain.deployToken({ name: "Example Dollar", symbol: "EUSD", decimals: 6 });
  const usdt = chain.deployToken({ name: "Example Tether", symbol: "ETET", decimals: 6 });
  const asset = chain.deployToken({ name: "Example Asset", symbol: "EXA", decimals: 18 });

  // ── Step 2: Create the desk ──────────────────────────────────────────
  // The administrator receives every payment and is the only account
  // allowed to create or change sales.
  const desk = new SaleDesk({
    runtime: chain,
    address: chain.createAccount(),
    owner: admin,
    stablecoins: { A: usdc.address, B: usdt.address },
    logger: createLogger({ level: "warn" }),
  });
  desk.onEvent((event) => console.log(`  event: ${event.type}`));

  // ── Step 3: Open a sale and fund custody ─────────────────────────────
  // $0.25 per unit, at most 10,000 units.
  const index = desk.createSale(
    admin,
    transferSale(asset.address, { priceInUsd: 250_000n, maxTokensToSell: 10_000n * ASSET_UNIT })
  );
  asset.faucet(desk.address, 10_000n * ASSET_UNIT);
  console.log(`Sale #${index} open, desk holds ${formatDecimal(asset.balanceOf(desk.address), 18)} EXA`);

  // ── Step 4: Buy ──────────────────────────────────────────────────────
  // The buyer approves the desk for the USD cost, then buys.
  usdc.faucet(buyer, 1_000_000_000n);
  const amount = 400n * ASSET_UNIT;
  const cost = desk.quoteStable(index, amount);
  usdc.approve(buyer, desk.address, cost);

  const receipt = desk.buyWithStablecoinA(buyer, index, amount, "example-1");
  console.log(`Bought ${formatDecimal(receipt.amountBought, 18)} EXA for $${formatDecimal(receipt.usdCost, 6)}`);
  console.log(`Admin now holds $${formatDecimal(usdc.balanceOf(admin), 6)}`);

  // ── Step 5: Hit the cap ──────────────────────────────────────────────
  usdc.approve(buyer, desk.address, 1_000_000_000n);
  try {
    desk.buyWithStablecoinA(buyer, index, 9_601n * ASSET_UNIT);
  } catch (err) {
    console.log(`Rejected: ${err instanceof Error ? err.message : String(err)}`);
  }
  console.log(`Sold so far: ${formatDecimal(desk.getSale(index).tokensSold, 18)} EXA`);
}

main();
