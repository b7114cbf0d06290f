import { expect } from "chai";
import {
  AuthorizationError,
  NotFoundError,
  ValidationError,
  ZERO_ADDRESS,
  mintSale,
  transferFromSale,
  transferSale,
  type CreateSaleParams,
} from "../sdk/core/src";
import { setupDesk, stock, units, type DeskFixture } from "./helpers";

describe("Sale registry", () => {
  let fx: DeskFixture;

  beforeEach(() => {
    fx = setupDesk();
  });

  it("round-trips created sales and hands out sequential indices", () => {
    const params: CreateSaleParams = {
      assetAddress: fx.asset.address,
      priceInUsd: 2_500_000n,
      maxTokensToSell: units(500n),
      startDate: 1_700_000_100,
      endDate: 1_700_086_400,
      paused: true,
      disbursement: { method: "transferFrom", source: fx.stranger },
    };

    expect(fx.desk.createSale(fx.owner, transferSale(fx.asset.address))).to.equal(0);
    expect(fx.desk.saleCount).to.equal(1);
    const index = fx.desk.createSale(fx.owner, params);
    expect(index).to.equal(1);

    const sale = fx.desk.getSale(index);
    expect(sale).to.deep.equal({ index: 1, tokensSold: 0n, ...params });
  });

  it("emits SaleCreated with the effective source address", () => {
    fx.desk.createSale(fx.owner, transferSale(fx.asset.address));
    fx.desk.createSale(fx.owner, transferFromSale(fx.asset.address, fx.stranger));
    fx.desk.createSale(fx.owner, mintSale(fx.asset.address));

    const created = fx.events.filter((e) => e.type === "SaleCreated");
    expect(created.map((e) => e.type === "SaleCreated" && e.sourceAddress)).to.deep.equal([
      fx.desk.address,
      fx.stranger,
      fx.asset.address,
    ]);
    expect(created.map((e) => e.type === "SaleCreated" && e.disbursementMethod)).to.deep.equal([
      "transfer",
      "transferFrom",
      "mint",
    ]);
  });

  it("rejects non-administrators without side effects", () => {
    expect(() => fx.desk.createSale(fx.stranger, transferSale(fx.asset.address))).to.throw(AuthorizationError);
    expect(fx.desk.saleCount).to.equal(0);

    fx.desk.createSale(fx.owner, transferSale(fx.asset.address));
    expect(() => fx.desk.setPrice(fx.stranger, 0, 5n)).to.throw(AuthorizationError);
    expect(() => fx.desk.setPaused(fx.buyer, 0, true)).to.throw(AuthorizationError);
    expect(() => fx.desk.setMaxTokens(fx.buyer, 7, 1n)).to.throw(AuthorizationError);
    expect(fx.desk.getSale(0).priceInUsd).to.equal(1_000_000n);
    expect(fx.desk.getSale(0).paused).to.equal(false);
    expect(fx.events.filter((e) => e.type === "SaleUpdated")).to.have.length(0);
  });

  it("fails with NotFound for unknown indices", () => {
    expect(() => fx.desk.getSale(0)).to.throw(NotFoundError);
    fx.desk.createSale(fx.owner, transferSale(fx.asset.address));
    expect(() => fx.desk.getSale(1)).to.throw(NotFoundError);
    expect(() => fx.desk.getSale(-1)).to.throw(NotFoundError);
    expect(() => fx.desk.getSale(0.5)).to.throw(NotFoundError);
    expect(() => fx.desk.setPrice(fx.owner, 3, 1n)).to.throw(NotFoundError);
  });

  it("validates creation parameters", () => {
    expect(() => fx.desk.createSale(fx.owner, transferSale(fx.asset.address, { priceInUsd: 0n }))).to.throw(
      ValidationError
    );
    expect(() => fx.desk.createSale(fx.owner, transferSale(ZERO_ADDRESS))).to.throw(ValidationError);
    expect(() => fx.desk.createSale(fx.owner, transferSale("not-an-address"))).to.throw(ValidationError);
    expect(() => fx.desk.createSale(fx.owner, transferFromSale(fx.asset.address, ZERO_ADDRESS))).to.throw(
      ValidationError
    );
    expect(() => fx.desk.createSale(fx.owner, transferSale(fx.asset.address, { startDate: -1 }))).to.throw(
      ValidationError
    );
    expect(fx.desk.saleCount).to.equal(0);
  });

  it("applies every setter and emits the full post-update record", () => {
    const index = fx.desk.createSale(fx.owner, transferSale(fx.asset.address));
    const otherAsset = fx.chain.deployToken({ name: "Other", symbol: "OTH", decimals: 18 });

    fx.desk.setPrice(fx.owner, index, 3_000_000n);
    fx.desk.setMaxTokens(fx.owner, index, units(10n));
    fx.desk.setStartDate(fx.owner, index, 1_700_000_500);
    fx.desk.setEndDate(fx.owner, index, 1_700_009_000);
    fx.desk.setAssetAddress(fx.owner, index, otherAsset.address);
    const sale = fx.desk.setPaused(fx.owner, index, true);

    expect(sale).to.deep.equal({
      index,
      assetAddress: otherAsset.address,
      disbursement: { method: "transfer" },
      priceInUsd: 3_000_000n,
      maxTokensToSell: units(10n),
      tokensSold: 0n,
      startDate: 1_700_000_500,
      endDate: 1_700_009_000,
      paused: true,
    });

    const updates = fx.events.filter((e) => e.type === "SaleUpdated");
    expect(updates).to.have.length(6);
    expect(updates[5]).to.deep.equal({
      type: "SaleUpdated",
      index,
      assetAddress: otherAsset.address,
      priceInUsd: 3_000_000n,
      maxTokensToSell: units(10n),
      startDate: 1_700_000_500,
      endDate: 1_700_009_000,
      paused: true,
      disbursementMethod: "transfer",
      sourceAddress: fx.desk.address,
    });
  });

  it("refuses to lower the cap below what has been sold", () => {
    const index = fx.desk.createSale(fx.owner, transferSale(fx.asset.address));
    stock(fx, units(10n));
    fx.usdA.approve(fx.buyer, fx.desk.address, 5_000_000n);
    fx.desk.buyWithStablecoinA(fx.buyer, index, units(5n));

    expect(() => fx.desk.setMaxTokens(fx.owner, index, units(4n))).to.throw(ValidationError);
    expect(fx.desk.setMaxTokens(fx.owner, index, units(5n)).maxTokensToSell).to.equal(units(5n));
    expect(fx.desk.setMaxTokens(fx.owner, index, 0n).maxTokensToSell).to.equal(0n);
  });

  it("applies a multi-field update as one operation", () => {
    const index = fx.desk.createSale(fx.owner, transferSale(fx.asset.address));
    const eventsBefore = fx.events.length;

    const sale = fx.desk.updateSale(fx.owner, index, { priceInUsd: 2_000_000n, paused: true });

    expect(sale.priceInUsd).to.equal(2_000_000n);
    expect(sale.paused).to.equal(true);
    expect(fx.events.length).to.equal(eventsBefore + 2);
  });

  it("leaves every field untouched when one field of an update fails", () => {
    const index = fx.desk.createSale(fx.owner, transferSale(fx.asset.address));
    stock(fx, units(10n));
    fx.usdA.approve(fx.buyer, fx.desk.address, 5_000_000n);
    fx.desk.buyWithStablecoinA(fx.buyer, index, units(5n));
    const eventsBefore = fx.events.length;

    expect(() =>
      fx.desk.updateSale(fx.owner, index, { priceInUsd: 2_000_000n, maxTokensToSell: units(1n) })
    ).to.throw(ValidationError, "below");

    expect(fx.desk.getSale(index).priceInUsd).to.equal(1_000_000n);
    expect(fx.desk.getSale(index).maxTokensToSell).to.equal(0n);
    expect(fx.events.length).to.equal(eventsBefore);
  });

  it("rejects empty or unauthorised updates", () => {
    const index = fx.desk.createSale(fx.owner, transferSale(fx.asset.address));
    expect(() => fx.desk.updateSale(fx.owner, index, {})).to.throw(ValidationError, "no fields");
    expect(() => fx.desk.updateSale(fx.stranger, index, { paused: true })).to.throw(AuthorizationError);
    expect(fx.desk.getSale(index).paused).to.equal(false);
  });

  it("returns snapshots that cannot mutate the registry", () => {
    const index = fx.desk.createSale(fx.owner, transferSale(fx.asset.address));
    const sale = fx.desk.getSale(index);
    expect(Object.isFrozen(sale)).to.equal(true);
    expect(() => {
      Object.assign(sale, { tokensSold: 99n });
    }).to.throw(TypeError);
    expect(fx.desk.getSale(index).tokensSold).to.equal(0n);
  });

  it("lists sales in index order", () => {
    fx.desk.createSale(fx.owner, transferSale(fx.asset.address, { priceInUsd: 1n }));
    fx.desk.createSale(fx.owner, mintSale(fx.asset.address, { priceInUsd: 2n }));
    expect(fx.desk.listSales().map((s) => [s.index, s.priceInUsd])).to.deep.equal([
      [0, 1n],
      [1, 2n],
    ]);
  });
});
