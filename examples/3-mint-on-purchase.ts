/**
 * Example 3: Mint on Purchase With a Sale Window
 * ==============================================
 *
 * WHAT:  A sale that mints the asset to each buyer, open only between a start
 *        and an end date.
 * WHEN:  The asset is issued on demand and the desk holds the minter role.
 * WHY:   Nothing has to be pre-funded; the cap and the window are the only
 *        limits on issuance.
 *
 * Run: npx tsx examples/3-mint-on-purchase.ts
 */

import { ASSET_UNIT, LocalChain, SaleDesk, StateError, createLogger, formatDecimal, mintSale } from "../sdk/core/src";

function main() {
  const chain = new LocalChain({ timestamp: 1_700_000_000 });
  const admin = chain.createAccount();
  const buyer = chain.createAccount();
  const usd = chain.deployToken({ name: "Example Dollar", symbol: "EUSD", decimals: 6 });
  const asset = chain.deployToken({ name: "Minted Asset", symbol: "MNT", decimals: 18, mintable: true });

  const desk = new SaleDesk({
    runtime: chain,
    address: chain.createAccount(),
    owner: admin,
    stablecoins: { A: usd.address },
    logger: createLogger({ level: "warn" }),
  });
  asset.grantMinter(desk.address);

  // ── Step 1: Open in one hour, close a day later ──────────────────────
  const startDate = chain.now() + 3_600;
  const index = desk.createSale(admin, mintSale(asset.address, { startDate, endDate: startDate + 86_400 }));

  usd.faucet(buyer, 100_000_000n);
  usd.approve(buyer, desk.address, 100_000_000n);

  // ── Step 2: Too early ────────────────────────────────────────────────
  try {
    desk.buyWithStablecoinA(buyer, index, 10n * ASSET_UNIT);
  } catch (err) {
    if (err instanceof StateError) console.log(`Before the window: ${err.message}`);
  }

  // ── Step 3: Inside the window the asset is minted to the buyer ───────
  chain.warp(startDate);
  desk.buyWithStablecoinA(buyer, index, 10n * ASSET_UNIT);
  console.log(`Minted ${formatDecimal(asset.balanceOf(buyer), 18)} MNT, supply ${formatDecimal(asset.totalSupply, 18)}`);

  // ── Step 4: After the end date the sale is closed ────────────────────
  chain.advance(86_400);
  console.log(`Active after the end date: ${desk.isSaleActive(index)}`);
}

main();
