import { expect } from "chai";
import {
  Journal,
  ReentrancyError,
  ReentrancyLock,
  TransferFailureError,
  transferSale,
  type Address,
  type Erc20Token,
} from "../sdk/core/src";
import { setupDesk, units, type DeskFixture } from "./helpers";

/**
 * Asset whose transfer hands control back to the caller before moving
 * anything, the way a hostile token contract would.
 */
class CallbackToken implements Erc20Token {
  onTransfer: () => void = () => undefined;
  private readonly balances = new Map<Address, bigint>();

  constructor(readonly address: Address) {}

  balanceOf(owner: Address): bigint {
    return this.balances.get(owner) ?? 0n;
  }

  allowance(): bigint {
    return 0n;
  }

  approve(): boolean {
    return false;
  }

  transfer(caller: Address, to: Address, amount: bigint): boolean {
    this.onTransfer();
    this.balances.set(caller, this.balanceOf(caller) - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    return true;
  }

  transferFrom(): boolean {
    return false;
  }

  credit(owner: Address, amount: bigint): void {
    this.balances.set(owner, this.balanceOf(owner) + amount);
  }
}

describe("Reentrancy and atomicity", () => {
  let fx: DeskFixture;

  beforeEach(() => {
    fx = setupDesk();
  });

  it("rejects a purchase re-entered from the disbursement call", () => {
    const hostile = fx.chain.host((address) => new CallbackToken(address));
    hostile.credit(fx.desk.address, units(100n));
    const index = fx.desk.createSale(fx.owner, transferSale(hostile.address, { maxTokensToSell: units(10n) }));
    fx.usdA.approve(fx.buyer, fx.desk.address, 100_000_000n);

    let reentryError: unknown;
    hostile.onTransfer = () => {
      try {
        fx.desk.buyWithStablecoinA(fx.buyer, index, units(10n));
      } catch (err) {
        reentryError = err;
        throw err;
      }
    };

    expect(() => fx.desk.buyWithStablecoinA(fx.buyer, index, units(10n))).to.throw(ReentrancyError);
    expect(reentryError).to.be.instanceOf(ReentrancyError);
    expect(fx.desk.getSale(index).tokensSold).to.equal(0n);
    expect(fx.usdA.balanceOf(fx.owner)).to.equal(0n);
    expect(fx.usdA.allowance(fx.buyer, fx.desk.address)).to.equal(100_000_000n);

    // Lock is released after the failure.
    hostile.onTransfer = () => undefined;
    fx.desk.buyWithStablecoinA(fx.buyer, index, units(10n));
    expect(fx.desk.getSale(index).tokensSold).to.equal(units(10n));
  });

  it("rejects admin mutations attempted from inside a purchase", () => {
    const hostile = fx.chain.host((address) => new CallbackToken(address));
    hostile.credit(fx.desk.address, units(100n));
    const index = fx.desk.createSale(fx.owner, transferSale(hostile.address));
    fx.usdA.approve(fx.buyer, fx.desk.address, 100_000_000n);

    hostile.onTransfer = () => {
      fx.desk.setPrice(fx.owner, index, 1n);
    };

    expect(() => fx.desk.buyWithStablecoinA(fx.buyer, index, units(1n))).to.throw(ReentrancyError);
    expect(fx.desk.getSale(index).priceInUsd).to.equal(1_000_000n);
  });

  it("wraps foreign exceptions from collaborator code", () => {
    const hostile = fx.chain.host((address) => new CallbackToken(address));
    hostile.credit(fx.desk.address, units(100n));
    const index = fx.desk.createSale(fx.owner, transferSale(hostile.address));
    fx.usdA.approve(fx.buyer, fx.desk.address, 100_000_000n);
    hostile.onTransfer = () => {
      throw new RangeError("boom");
    };

    let caught: unknown;
    try {
      fx.desk.buyWithStablecoinA(fx.buyer, index, units(1n));
    } catch (err) {
      caught = err;
    }
    expect(caught).to.be.instanceOf(TransferFailureError);
    if (caught instanceof TransferFailureError) {
      expect(caught.cause).to.be.instanceOf(RangeError);
    }
  });

  describe("ReentrancyLock", () => {
    it("fails fast on nested acquisition and releases on every exit", () => {
      const lock = new ReentrancyLock();
      expect(() => lock.run(() => lock.run(() => 1))).to.throw(ReentrancyError);
      expect(lock.locked).to.equal(false);
      expect(lock.run(() => 2)).to.equal(2);
    });
  });

  describe("Journal", () => {
    it("replays undo entries newest-first on failure", () => {
      const journal = new Journal();
      const log: string[] = [];
      let value = 0;

      expect(() =>
        journal.run(() => {
          for (const next of [1, 2, 3]) {
            const previous = value;
            journal.record(() => {
              log.push(`undo ${next}`);
              value = previous;
            });
            value = next;
          }
          throw new Error("abort");
        })
      ).to.throw("abort");

      expect(value).to.equal(0);
      expect(log).to.deep.equal(["undo 3", "undo 2", "undo 1"]);
    });

    it("defers hooks to the outermost commit and drops them on rollback", () => {
      const journal = new Journal();
      const fired: string[] = [];

      journal.run(() => {
        journal.afterCommit(() => fired.push("outer"));
        try {
          journal.run(() => {
            journal.afterCommit(() => fired.push("inner-failed"));
            throw new Error("inner");
          });
        } catch {
          fired.push("caught");
        }
        journal.run(() => journal.afterCommit(() => fired.push("inner-ok")));
        expect(fired).to.deep.equal(["caught"]);
      });

      expect(fired).to.deep.equal(["caught", "outer", "inner-ok"]);
      expect(journal.inTransaction).to.equal(false);
    });
  });
});
