/**
 * Self-contained demo that walks a SaleDesk through its whole lifecycle on
 * the in-process chain. Uses direct SDK imports (relative).
 */
import {
  ASSET_UNIT,
  LocalChain,
  SaleDesk,
  createLogger,
  formatDecimal,
  isSaleDeskError,
  mintSale,
  transferFromSale,
  transferSale,
} from "./sdk/core/src";

const G = "\x1b[32m", C = "\x1b[36m", Y = "\x1b[33m", B = "\x1b[1m", N = "\x1b[0m";
const step = (s: string) => console.log(`${G}▸ ${s}${N}`);
const warn = (s: string) => console.log(`${Y}▸ ${s}${N}`);
const header = (s: string) => {
  console.log(`\n${B}${C}${"═".repeat(56)}${N}`);
  console.log(`${B}${C}  ${s}${N}`);
  console.log(`${B}${C}${"═".repeat(56)}${N}\n`);
};
const units = (v: bigint) => formatDecimal(v, 18);
const usd = (v: bigint) => `$${formatDecimal(v, 6)}`;

function attempt(label: string, work: () => void) {
  try {
    work();
    step(`${label}: ok`);
  } catch (err) {
    if (!isSaleDeskError(err)) throw err;
    warn(`${label}: ${err.code} (${err.message})`);
  }
}

function main() {
  const chain = new LocalChain();
  const admin = chain.createAccount();
  const treasury = chain.createAccount();
  const alice = chain.createAccount();
  const bob = chain.createAccount();

  const usdA = chain.deployToken({ name: "Demo Dollar A", symbol: "DUSDA", decimals: 6 });
  const usdB = chain.deployToken({ name: "Demo Dollar B", symbol: "DUSDB", decimals: 6 });
  const asset = chain.deployToken({ name: "Demo Asset", symbol: "DEMO", decimals: 18, mintable: true });
  const feed = chain.deployPriceFeed(200_000_000_000n);

  // ═══════════════════════════════════════════════════════════
  // DEMO 1: Desk setup
  // ═══════════════════════════════════════════════════════════
  header("Demo 1: Create the desk");

  const desk = new SaleDesk({
    runtime: chain,
    address: chain.createAccount(),
    owner: admin,
    stablecoins: { A: usdA.address, B: usdB.address },
    priceFeed: feed.address,
    logger: createLogger({ level: "warn" }),
  });
  desk.onEvent((event) => console.log(`    ${C}event${N} ${event.type}`));
  asset.grantMinter(desk.address);
  step(`Desk ${desk.address} administered by ${admin}`);

  for (const buyer of [alice, bob]) {
    usdA.faucet(buyer, 10_000_000_000n);
    usdB.faucet(buyer, 10_000_000_000n);
    chain.setNativeBalance(buyer, 10n * ASSET_UNIT);
  }

  // ═══════════════════════════════════════════════════════════
  // DEMO 2: Three disbursement methods
  // ═══════════════════════════════════════════════════════════
  header("Demo 2: One sale per disbursement method");

  const custody = desk.createSale(admin, transferSale(asset.address, { priceInUsd: 1_000_000n, maxTokensToSell: 500n * ASSET_UNIT }));
  asset.faucet(desk.address, 500n * ASSET_UNIT);

  const delegated = desk.createSale(admin, transferFromSale(asset.address, treasury, { priceInUsd: 2_000_000n }));
  asset.faucet(treasury, 1_000n * ASSET_UNIT);
  asset.approve(treasury, desk.address, 1_000n * ASSET_UNIT);

  const minted = desk.createSale(admin, mintSale(asset.address, { priceInUsd: 500_000n }));
  step(`Sales #${custody} (custody), #${delegated} (treasury allowance), #${minted} (mint)`);

  // ═══════════════════════════════════════════════════════════
  // DEMO 3: Purchases
  // ═══════════════════════════════════════════════════════════
  header("Demo 3: Purchases");

  usdA.approve(alice, desk.address, 1_000_000_000n);
  const r1 = desk.buyWithStablecoinA(alice, custody, 100n * ASSET_UNIT, "alice-ref");
  step(`Alice bought ${units(r1.amountBought)} DEMO from #${custody} for ${usd(r1.usdCost)}`);

  usdB.approve(bob, desk.address, 1_000_000_000n);
  const r2 = desk.buyWithStablecoinB(bob, delegated, 25n * ASSET_UNIT);
  step(`Bob bought ${units(r2.amountBought)} DEMO from #${delegated} for ${usd(r2.usdCost)}`);

  const r3 = desk.buyWithNative(alice, minted, ASSET_UNIT / 2n);
  step(`Alice spent ${units(r3.nativeSent)} native on #${minted} for ${units(r3.amountBought)} DEMO`);

  console.log(`\n  Admin received ${usd(usdA.balanceOf(admin))} + ${usd(usdB.balanceOf(admin))} + ${units(chain.nativeBalanceOf(admin))} native`);

  // ═══════════════════════════════════════════════════════════
  // DEMO 4: Guards
  // ═══════════════════════════════════════════════════════════
  header("Demo 4: Guards and rollbacks");

  attempt("Bob buys past the cap", () => desk.buyWithStablecoinA(bob, custody, 401n * ASSET_UNIT));
  desk.setPaused(admin, custody, true);
  attempt("Alice buys while paused", () => desk.buyWithStablecoinA(alice, custody, ASSET_UNIT));
  desk.setPaused(admin, custody, false);
  attempt("Bob edits a sale", () => desk.setPrice(bob, custody, 1n));
  feed.setAnswer(-1n);
  attempt("Native purchase on a broken feed", () => desk.buyWithNative(bob, minted, ASSET_UNIT));
  feed.setAnswer(200_000_000_000n);

  // ═══════════════════════════════════════════════════════════
  // DEMO 5: Administration
  // ═══════════════════════════════════════════════════════════
  header("Demo 5: Sweeps and ownership");

  usdA.faucet(desk.address, 3_000_000n);
  desk.withdrawForeignAsset(admin, usdA.address, 3_000_000n);
  step("Swept a stray stablecoin deposit");

  desk.transferOwnership(admin, treasury);
  step(`Ownership moved to ${desk.owner}`);

  for (const sale of desk.listSales()) {
    console.log(`  #${sale.index}  sold ${units(sale.tokensSold)}  active=${desk.isSaleActive(sale.index)}`);
  }
}

main();
