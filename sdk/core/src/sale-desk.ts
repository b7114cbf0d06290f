import type { Logger } from "pino";
import { AccessControl } from "./access-control";
import { callExternal } from "./disbursement";
import { ValidationError } from "./errors";
import { isActive } from "./guard";
import { ReentrancyLock } from "./lock";
import { createLogger } from "./logger";
import { PriceOracleAdapter } from "./oracle";
import type { NativeQuote } from "./pricing";
import { PurchaseEngine } from "./purchase";
import { SaleRegistry } from "./registry";
import type {
  Address,
  CreateSaleParams,
  Sale,
  SaleEvent,
  SalePatch,
  SaleEventListener,
  SaleRuntime,
  StableSlot,
  TokensBought,
} from "./types";
import { ZERO_ADDRESS, isZeroAddress, parseAmount, toAddress } from "./utils";

export interface SaleDeskOptions {
  runtime: SaleRuntime;
  /** Address the desk holds custody under and is approved as spender. */
  address: Address;
  owner: Address;
  stablecoins?: Partial<Record<StableSlot, Address>>;
  priceFeed?: Address;
  /** Seconds after which an oracle answer counts as stale; 0 disables. */
  oracleMaxAge?: number;
  logger?: Logger;
}

/**
 * Main entry point: a registry of token sales plus the purchase protocol.
 *
 * Every mutating call takes the caller's address first, runs under a single
 * reentrancy lock and inside one journal unit, so it either completes or
 * leaves nothing behind. Notifications are delivered after commit.
 */
export class SaleDesk {
  readonly address: Address;
  readonly runtime: SaleRuntime;

  private readonly access: AccessControl;
  private readonly registry: SaleRegistry;
  private readonly oracle: PriceOracleAdapter;
  private readonly engine: PurchaseEngine;
  private readonly lock = new ReentrancyLock();
  private readonly listeners = new Set<SaleEventListener>();
  private readonly logger: Logger;
  private stables: Record<StableSlot, Address>;

  constructor(options: SaleDeskOptions) {
    this.runtime = options.runtime;
    this.address = toAddress(options.address, "desk address");
    this.logger = (options.logger ?? createLogger()).child({ desk: this.address });

    const emit = (event: SaleEvent) => this.emit(event);
    const journal = this.runtime.journal;

    this.access = new AccessControl(options.owner, journal, emit);
    this.registry = new SaleRegistry({
      journal,
      access: this.access,
      emit,
      self: this.address,
      logger: this.logger,
    });
    this.oracle = new PriceOracleAdapter(this.runtime, {
      feed: options.priceFeed ? toAddress(options.priceFeed, "price feed") : undefined,
      maxAge: options.oracleMaxAge,
    });
    this.stables = {
      A: options.stablecoins?.A ? toAddress(options.stablecoins.A, "stablecoin A") : ZERO_ADDRESS,
      B: options.stablecoins?.B ? toAddress(options.stablecoins.B, "stablecoin B") : ZERO_ADDRESS,
    };
    this.engine = new PurchaseEngine({
      runtime: this.runtime,
      registry: this.registry,
      oracle: this.oracle,
      self: this.address,
      treasury: () => this.access.owner,
      stablecoins: () => this.stables,
      emit,
      logger: this.logger,
    });
  }

  // ── Views ───────────────────────────────────────────────────────────

  get owner(): Address {
    return this.access.owner;
  }

  get saleCount(): number {
    return this.registry.length;
  }

  get priceFeed(): Address {
    return this.oracle.feed;
  }

  stablecoin(slot: StableSlot): Address {
    return this.stables[slot];
  }

  getSale(index: number): Sale {
    return this.registry.get(index);
  }

  listSales(): Sale[] {
    return this.registry.list();
  }

  isSaleActive(index: number): boolean {
    return isActive(this.registry.get(index), this.runtime.now());
  }

  /** 6-decimal USD cost of `amountToBuy` units at the current price. */
  quoteStable(index: number, amountToBuy: bigint): bigint {
    return this.engine.quoteStable(index, amountToBuy);
  }

  quoteNative(index: number, nativeSent: bigint): NativeQuote {
    return this.engine.quoteNative(index, nativeSent);
  }

  /** Subscribe to committed notifications. Returns an unsubscribe function. */
  onEvent(listener: SaleEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ── Sale administration ─────────────────────────────────────────────

  createSale(caller: Address, params: CreateSaleParams): number {
    return this.execute(() => this.registry.create(caller, params));
  }

  setPrice(caller: Address, index: number, priceInUsd: bigint): Sale {
    return this.execute(() => this.registry.setPrice(caller, index, priceInUsd));
  }

  setMaxTokens(caller: Address, index: number, maxTokensToSell: bigint): Sale {
    return this.execute(() => this.registry.setMaxTokens(caller, index, maxTokensToSell));
  }

  setStartDate(caller: Address, index: number, startDate: number): Sale {
    return this.execute(() => this.registry.setStartDate(caller, index, startDate));
  }

  setEndDate(caller: Address, index: number, endDate: number): Sale {
    return this.execute(() => this.registry.setEndDate(caller, index, endDate));
  }

  setAssetAddress(caller: Address, index: number, assetAddress: Address): Sale {
    return this.execute(() => this.registry.setAssetAddress(caller, index, assetAddress));
  }

  setPaused(caller: Address, index: number, paused: boolean): Sale {
    return this.execute(() => this.registry.setPaused(caller, index, paused));
  }

  /**
   * Apply several field changes as one operation: either every field in
   * `patch` is written or none is.
   */
  updateSale(caller: Address, index: number, patch: SalePatch): Sale {
    return this.execute(() => {
      this.access.requireOwner(caller);
      let sale = this.registry.get(index);
      let changed = false;

      if (patch.priceInUsd !== undefined) {
        sale = this.registry.setPrice(caller, index, patch.priceInUsd);
        changed = true;
      }
      if (patch.maxTokensToSell !== undefined) {
        sale = this.registry.setMaxTokens(caller, index, patch.maxTokensToSell);
        changed = true;
      }
      if (patch.startDate !== undefined) {
        sale = this.registry.setStartDate(caller, index, patch.startDate);
        changed = true;
      }
      if (patch.endDate !== undefined) {
        sale = this.registry.setEndDate(caller, index, patch.endDate);
        changed = true;
      }
      if (patch.assetAddress !== undefined) {
        sale = this.registry.setAssetAddress(caller, index, patch.assetAddress);
        changed = true;
      }
      if (patch.paused !== undefined) {
        sale = this.registry.setPaused(caller, index, patch.paused);
        changed = true;
      }

      if (!changed) throw new ValidationError("Sale update has no fields");
      return sale;
    });
  }

  // ── Desk administration ─────────────────────────────────────────────

  /** Configure (or clear, with the zero address) an accepted stablecoin. */
  setStablecoin(caller: Address, slot: StableSlot, token: Address): void {
    this.execute(() => {
      this.access.requireOwner(caller);
      if (slot !== "A" && slot !== "B") throw new ValidationError(`Unknown stablecoin slot: ${String(slot)}`);
      const address = toAddress(token, "stablecoin");

      const previous = this.stables;
      this.runtime.journal.record(() => {
        this.stables = previous;
      });
      this.stables = { ...previous, [slot]: address };

      this.logger.info({ slot, address }, "Stablecoin updated");
      this.emit({ type: "StablecoinUpdated", slot, address });
    });
  }

  setPriceFeed(caller: Address, feed: Address): void {
    this.execute(() => {
      this.access.requireOwner(caller);
      const address = toAddress(feed, "price feed");

      const previous = this.oracle.feed;
      this.runtime.journal.record(() => {
        this.oracle.feed = previous;
      });
      this.oracle.feed = address;

      this.logger.info({ address }, "Price feed updated");
      this.emit({ type: "PriceFeedUpdated", address });
    });
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.execute(() => this.access.transferOwnership(caller, newOwner));
  }

  /** Sweep a token balance held by the desk to the administrator. */
  withdrawForeignAsset(caller: Address, token: Address, amount: bigint): void {
    this.execute(() => {
      this.access.requireOwner(caller);
      const tokenAddress = toAddress(token, "token");
      if (isZeroAddress(tokenAddress)) throw new ValidationError("Token cannot be the zero address");
      const value = parseAmount(amount);
      const to = this.access.owner;

      callExternal("Foreign asset withdrawal", () =>
        this.runtime.token(tokenAddress).transfer(this.address, to, value)
      );

      this.logger.info({ token: tokenAddress, amount: value.toString() }, "Foreign asset withdrawn");
      this.emit({ type: "ForeignAssetWithdrawn", token: tokenAddress, amount: value, to });
    });
  }

  /** Sweep the desk's whole native balance to the administrator. */
  withdrawNative(caller: Address): bigint {
    return this.execute(() => {
      this.access.requireOwner(caller);
      const amount = this.runtime.nativeBalanceOf(this.address);
      const to = this.access.owner;

      callExternal("Native withdrawal", () => this.runtime.transferNative(this.address, to, amount));

      this.logger.info({ amount: amount.toString() }, "Native balance withdrawn");
      this.emit({ type: "NativeWithdrawn", amount, to });
      return amount;
    });
  }

  // ── Purchases ───────────────────────────────────────────────────────

  buyWithStable(
    buyer: Address,
    index: number,
    payToken: Address,
    amountToBuy: bigint,
    referralCode = ""
  ): TokensBought {
    return this.execute(() =>
      this.engine.buyWithStable(toAddress(buyer, "buyer"), index, payToken, amountToBuy, referralCode)
    );
  }

  buyWithStablecoinA(buyer: Address, index: number, amountToBuy: bigint, referralCode = ""): TokensBought {
    return this.buyWithStable(buyer, index, this.stables.A, amountToBuy, referralCode);
  }

  buyWithStablecoinB(buyer: Address, index: number, amountToBuy: bigint, referralCode = ""): TokensBought {
    return this.buyWithStable(buyer, index, this.stables.B, amountToBuy, referralCode);
  }

  /** `nativeSent` is the native-currency amount attached to the call. */
  buyWithNative(buyer: Address, index: number, nativeSent: bigint, referralCode = ""): TokensBought {
    return this.execute(() =>
      this.engine.buyWithNative(toAddress(buyer, "buyer"), index, nativeSent, referralCode)
    );
  }

  // ── Internals ───────────────────────────────────────────────────────

  private execute<T>(work: () => T): T {
    return this.lock.run(() => this.runtime.journal.run(work));
  }

  private emit(event: SaleEvent): void {
    this.runtime.journal.afterCommit(() => {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          this.logger.error({ err, event: event.type }, "Event listener failed");
        }
      }
    });
  }
}
