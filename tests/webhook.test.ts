import { expect } from "chai";
import { getEvents, getPurchases, openDb, type Db } from "../backend/src/db/schema";
import { EventRecorder } from "../backend/src/services/event-recorder";
import { WebhookService, type WebhookFetch } from "../backend/src/services/webhook";
import { transferSale } from "../sdk/core/src";
import { setupDesk, silentLogger, stock, units } from "./helpers";

describe("Webhooks and event recording", () => {
  let db: Db;

  beforeEach(() => {
    db = openDb(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  describe("WebhookService", () => {
    it("delivers only to subscribers of the event or the wildcard", async () => {
      const urls: string[] = [];
      const fetchImpl: WebhookFetch = async (url) => {
        urls.push(url);
        return { ok: true, status: 200 };
      };
      const service = new WebhookService(db, silentLogger, fetchImpl);
      service.register("http://hooks.test/bought", ["TokensBought"]);
      service.register("http://hooks.test/created", ["SaleCreated", "SaleUpdated"]);
      service.register("http://hooks.test/all", ["*"]);

      await service.dispatch("SaleUpdated", { index: 0 });

      expect(urls).to.deep.equal(["http://hooks.test/created", "http://hooks.test/all"]);
    });

    it("sends the secret header only when one is set", async () => {
      const headers: Record<string, string>[] = [];
      const fetchImpl: WebhookFetch = async (_url, init) => {
        headers.push(init.headers);
        return { ok: true, status: 200 };
      };
      const service = new WebhookService(db, silentLogger, fetchImpl);
      service.register("http://hooks.test/plain", ["*"]);
      service.register("http://hooks.test/signed", ["*"], "test-secret");

      await service.dispatch("NativeWithdrawn", { amount: 1n });

      expect(headers).to.deep.equal([
        { "Content-Type": "application/json" },
        { "Content-Type": "application/json", "X-Webhook-Secret": "test-secret" },
      ]);
    });

    it("keeps going when a delivery fails or throws", async () => {
      const urls: string[] = [];
      const fetchImpl: WebhookFetch = async (url) => {
        urls.push(url);
        if (url.endsWith("/down")) throw new Error("connection refused");
        return { ok: !url.endsWith("/500"), status: url.endsWith("/500") ? 500 : 200 };
      };
      const service = new WebhookService(db, silentLogger, fetchImpl);
      service.register("http://hooks.test/down", ["*"]);
      service.register("http://hooks.test/500", ["*"]);
      service.register("http://hooks.test/ok", ["*"]);

      await service.dispatch("SaleCreated", {});

      expect(urls).to.deep.equal(["http://hooks.test/down", "http://hooks.test/500", "http://hooks.test/ok"]);
    });

    it("lists and removes registrations", () => {
      const service = new WebhookService(db, silentLogger);
      const id = service.register("http://hooks.test/a", ["SaleCreated", "TokensBought"]);

      expect(service.list()).to.deep.equal([
        { id, url: "http://hooks.test/a", events: ["SaleCreated", "TokensBought"], active: true },
      ]);
      expect(service.remove(id)).to.equal(true);
      expect(service.remove(id)).to.equal(false);
      expect(service.list()).to.deep.equal([]);
    });
  });

  describe("EventRecorder", () => {
    it("stores committed notifications with bigints as strings", () => {
      const fx = setupDesk();
      const recorder = new EventRecorder(fx.desk, db, silentLogger);
      recorder.start();

      const index = fx.desk.createSale(fx.owner, transferSale(fx.asset.address));
      stock(fx, units(5n));
      fx.usdA.approve(fx.buyer, fx.desk.address, 5_000_000n);
      fx.desk.buyWithStablecoinA(fx.buyer, index, units(5n), "ref-1");

      const events = getEvents(db);
      expect(events.map((e) => e.type)).to.deep.equal(["TokensBought", "SaleCreated"]);
      expect(events[0].data).to.deep.equal({
        buyer: fx.buyer,
        index,
        amountBought: units(5n).toString(),
        priceInUsd: "1000000",
        usdCost: "5000000",
        nativeSent: "0",
        referralCode: "ref-1",
      });

      expect(getPurchases(db, { buyer: fx.buyer })).to.deep.equal([
        {
          id: 1,
          sale: index,
          buyer: fx.buyer,
          amountBought: units(5n).toString(),
          priceInUsd: "1000000",
          usdCost: "5000000",
          nativeSent: "0",
          referralCode: "ref-1",
          timestamp: 1_700_000_000,
        },
      ]);
      recorder.stop();
    });

    it("records nothing for rolled-back operations or after stop", () => {
      const fx = setupDesk();
      const recorder = new EventRecorder(fx.desk, db, silentLogger);
      recorder.start();

      const index = fx.desk.createSale(fx.owner, transferSale(fx.asset.address));
      fx.usdA.approve(fx.buyer, fx.desk.address, 5_000_000n);
      expect(() => fx.desk.buyWithStablecoinA(fx.buyer, index, units(5n))).to.throw();
      expect(getEvents(db)).to.have.length(1);

      recorder.stop();
      fx.desk.setPaused(fx.owner, index, true);
      expect(getEvents(db)).to.have.length(1);
      expect(getPurchases(db)).to.deep.equal([]);
    });

    it("forwards notifications to webhooks", async () => {
      const fx = setupDesk();
      const bodies: string[] = [];
      const service = new WebhookService(db, silentLogger, async (_url, init) => {
        bodies.push(init.body);
        return { ok: true, status: 200 };
      });
      service.register("http://hooks.test/sales", ["SaleCreated"]);
      const recorder = new EventRecorder(fx.desk, db, silentLogger, service);
      recorder.start();

      fx.desk.createSale(fx.owner, transferSale(fx.asset.address, { priceInUsd: 2_000_000n }));
      await recorder.flush();

      expect(bodies).to.have.length(1);
      const payload: unknown = JSON.parse(bodies[0]);
      expect(payload).to.have.property("event", "SaleCreated");
      expect(payload).to.have.nested.property("data.priceInUsd", "2000000");
      expect(payload).to.have.nested.property("data.sourceAddress", fx.desk.address);
      recorder.stop();
    });
  });
});
