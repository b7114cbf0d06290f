import { expect } from "chai";
import { once } from "events";
import type { Server } from "http";
import { createApp } from "../backend/src/app";
import { openDb, type Db } from "../backend/src/db/schema";
import { WebhookService } from "../backend/src/services/webhook";
import { purchaseBody } from "../sdk/cli/src/commands/buy";
import { eventsPath } from "../sdk/cli/src/commands/events";
import { quoteOffline } from "../sdk/cli/src/commands/quote";
import { ApiError, apiRequest, formatUsd, readSale, readSales, type GlobalArgs } from "../sdk/cli/src/config";
import { mintSale } from "../sdk/core/src";
import { setupDesk, silentLogger, type DeskFixture } from "./helpers";

describe("CLI", () => {
  describe("offline quotes", () => {
    it("prices a stablecoin purchase", () => {
      expect(quoteOffline({ price: "1.50", amount: "100" })).to.deep.equal({
        kind: "stable",
        amountToBuy: 100n * 10n ** 18n,
        usdCost: 150_000_000n,
      });
    });

    it("prices a native purchase from a USD rate", () => {
      expect(quoteOffline({ price: "1.5", native: "0.1", rate: "2000" })).to.deep.equal({
        kind: "native",
        nativeSent: 10n ** 17n,
        usdValue: 200n * 10n ** 18n,
        amountToBuy: 133_333_333_333_333_333_333n,
      });
    });

    it("rejects malformed decimals", () => {
      expect(() => quoteOffline({ price: "one", amount: "1" })).to.throw("Invalid price");
      expect(() => quoteOffline({ price: "0.0000001", amount: "1" })).to.throw("Invalid price");
    });

    it("needs a rate for native quotes", () => {
      expect(() => quoteOffline({ price: "1", native: "1" })).to.throw("--native with --rate");
    });
  });

  it("builds purchase bodies in base units", () => {
    expect(purchaseBody({ payment: "A", amount: "2.5", referral: "" })).to.deep.equal({
      payment: "A",
      amount: "2500000000000000000",
      referralCode: "",
    });
    expect(purchaseBody({ payment: "native", amount: "0.1", referral: "cli" })).to.deep.equal({
      payment: "native",
      nativeSent: "100000000000000000",
      referralCode: "cli",
    });
  });

  it("builds event queries", () => {
    expect(eventsPath({ limit: 20 })).to.equal("/api/events?limit=20");
    expect(eventsPath({ limit: 5, type: "TokensBought", sale: 0 })).to.equal(
      "/api/events?limit=5&type=TokensBought&sale=0"
    );
  });

  it("formats USD amounts", () => {
    expect(formatUsd(1_500_000n)).to.equal("$1.5");
    expect(formatUsd(0n)).to.equal("$0.0");
  });

  describe("backend client", () => {
    let fx: DeskFixture;
    let db: Db;
    let server: Server;
    let args: GlobalArgs;

    beforeEach(async () => {
      fx = setupDesk();
      db = openDb(":memory:");
      const app = createApp({
        desk: fx.desk,
        db,
        webhookService: new WebhookService(db, silentLogger),
        logger: silentLogger,
        apiKey: "test-api-key",
      });
      server = app.listen(0, "127.0.0.1");
      await once(server, "listening");
      const address = server.address();
      if (address === null || typeof address === "string") throw new Error("Server has no TCP address");
      args = { apiUrl: `http://127.0.0.1:${address.port}/`, apiKey: "test-api-key", caller: fx.owner };
    });

    afterEach(async () => {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
      db.close();
    });

    it("reads sales back into typed views", async () => {
      fx.desk.createSale(fx.owner, mintSale(fx.asset.address, { priceInUsd: 250_000n, maxTokensToSell: 10n }));

      const sales = readSales(await apiRequest(args, "GET", "/api/sales"));
      expect(sales).to.deep.equal([
        {
          index: 0,
          assetAddress: fx.asset.address,
          method: "mint",
          source: undefined,
          priceInUsd: 250_000n,
          maxTokensToSell: 10n,
          tokensSold: 0n,
          startDate: 0,
          endDate: 0,
          paused: false,
          active: true,
        },
      ]);
    });

    it("pauses a sale as the administrator", async () => {
      fx.desk.createSale(fx.owner, mintSale(fx.asset.address));
      const sale = readSale(await apiRequest(args, "PATCH", "/api/sales/0", { paused: true }));
      expect(sale.paused).to.equal(true);
      expect(fx.desk.getSale(0).paused).to.equal(true);
    });

    it("surfaces backend errors with their code", async () => {
      fx.desk.createSale(fx.owner, mintSale(fx.asset.address));
      let caught: unknown;
      try {
        await apiRequest({ ...args, caller: fx.stranger }, "PATCH", "/api/sales/0", { paused: true });
      } catch (err) {
        caught = err;
      }
      expect(caught).to.be.instanceOf(ApiError);
      if (caught instanceof ApiError) {
        expect(caught.status).to.equal(403);
        expect(caught.code).to.equal("AUTHORIZATION");
      }
    });

    it("rejects a wrong API key", async () => {
      let caught: unknown;
      try {
        await apiRequest({ ...args, apiKey: "wrong-key" }, "GET", "/api/sales");
      } catch (err) {
        caught = err;
      }
      expect(caught).to.be.instanceOf(ApiError);
      if (caught instanceof ApiError) expect(caught.message).to.equal("Invalid or missing API key");
    });
  });
});
