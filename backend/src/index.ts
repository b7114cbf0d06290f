import pino from "pino";
import { ASSET_UNIT, LocalChain, SaleDesk } from "../../sdk/core/src";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { openDb } from "./db/schema";
import { EventRecorder } from "./services/event-recorder";
import { WebhookService } from "./services/webhook";

const config = loadConfig();

const logger = pino({
  name: "saledesk-backend",
  level: config.logLevel,
  ...(config.logPretty ? { transport: { target: "pino-pretty" } } : {}),
});

// Initialize DB
const db = openDb(config.dbPath);
logger.info({ path: config.dbPath }, "SQLite database initialized");

// Development host: an in-process chain on wall-clock time
const chain = new LocalChain({ clock: () => Math.floor(Date.now() / 1000) });
const usdA = chain.deployToken({ name: "Dev Dollar A", symbol: "DUSDA", decimals: 6 });
const usdB = chain.deployToken({ name: "Dev Dollar B", symbol: "DUSDB", decimals: 6 });
const asset = chain.deployToken({ name: "Dev Sale Asset", symbol: "DSALE", decimals: 18, mintable: true });
const feed = chain.deployPriceFeed(config.nativeUsdPrice);

const desk = new SaleDesk({
  runtime: chain,
  address: chain.createAccount(),
  owner: config.ownerAddress ?? chain.createAccount(),
  stablecoins: { A: usdA.address, B: usdB.address },
  priceFeed: feed.address,
  oracleMaxAge: config.oracleMaxAge,
  logger,
});
asset.grantMinter(desk.address);
asset.faucet(desk.address, 1_000_000n * ASSET_UNIT);

// Keep the dev feed inside the staleness window
if (config.oracleMaxAge > 0) {
  const refreshMs = Math.max(1, Math.floor(config.oracleMaxAge / 2)) * 1000;
  setInterval(() => feed.setAnswer(config.nativeUsdPrice, chain.now()), refreshMs).unref();
}

for (const account of config.fundAccounts) {
  usdA.faucet(account, 1_000_000_000_000n);
  usdB.faucet(account, 1_000_000_000_000n);
  chain.setNativeBalance(account, 100n * ASSET_UNIT);
}

// Services
const webhookService = new WebhookService(db, logger);
const recorder = new EventRecorder(desk, db, logger, webhookService);
recorder.start();

const app = createApp({ desk, db, webhookService, logger, apiKey: config.apiKey });

const server = app.listen(config.port, () => {
  logger.info(`SaleDesk backend running on port ${config.port}`);
  logger.info(
    {
      desk: desk.address,
      owner: desk.owner,
      stablecoinA: usdA.address,
      stablecoinB: usdB.address,
      asset: asset.address,
      priceFeed: feed.address,
      funded: config.fundAccounts,
    },
    "Local chain ready"
  );
});

// Graceful shutdown
process.on("SIGTERM", () => {
  recorder.stop();
  server.close(() => {
    recorder
      .flush()
      .then(() => {
        db.close();
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      });
  });
});
