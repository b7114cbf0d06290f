import type { Logger } from "pino";
import { callExternal, disburse } from "./disbursement";
import {
  CapacityExceededError,
  InsufficientAllowanceError,
  StateError,
  TransferFailureError,
  ValidationError,
  isSaleDeskError,
} from "./errors";
import { inactiveReason } from "./guard";
import type { PriceOracleAdapter } from "./oracle";
import { nativeQuote, remainingCapacity, stableCost, type NativeQuote } from "./pricing";
import type { SaleRegistry } from "./registry";
import type { Address, Emit, Sale, SaleRuntime, StableSlot, TokensBought } from "./types";
import { isZeroAddress, parseAmount, sameAddress, toAddress } from "./utils";

export interface PurchaseEngineDeps {
  runtime: SaleRuntime;
  registry: SaleRegistry;
  oracle: PriceOracleAdapter;
  self: Address;
  /** Payment recipient: always the current administrator. */
  treasury: () => Address;
  stablecoins: () => Record<StableSlot, Address>;
  emit: Emit;
  logger: Logger;
}

/**
 * Purchase orchestration. Callers (the SaleDesk) run each entry point under
 * the reentrancy lock inside a journal unit, so any throw below leaves no
 * trace.
 */
export class PurchaseEngine {
  private readonly logger: Logger;

  constructor(private readonly deps: PurchaseEngineDeps) {
    this.logger = deps.logger.child({ module: "purchase" });
  }

  buyWithStable(
    buyer: Address,
    saleIndex: number,
    payToken: Address,
    amountToBuy: bigint,
    referralCode: string
  ): TokensBought {
    return this.traced("stable", saleIndex, buyer, () => {
      const token = this.acceptedStablecoin(payToken);
      const sale = this.activeSale(saleIndex);

      const amount = parseAmount(amountToBuy, "amountToBuy");
      if (amount === 0n) throw new ValidationError("amountToBuy must be greater than zero");

      const usdCost = stableCost(amount, sale.priceInUsd);
      if (usdCost === 0n) throw new ValidationError("Purchase amount is too small to price");

      this.requireCapacity(sale, amount);

      const { runtime, self } = this.deps;
      const allowance = this.readAllowance(token, buyer);
      if (usdCost > allowance) throw new InsufficientAllowanceError(usdCost, allowance);

      const treasury = this.deps.treasury();
      callExternal("Stablecoin payment", () =>
        runtime.token(token).transferFrom(self, buyer, treasury, usdCost)
      );

      return this.settle(sale, buyer, amount, usdCost, 0n, referralCode);
    });
  }

  buyWithNative(buyer: Address, saleIndex: number, nativeSent: bigint, referralCode: string): TokensBought {
    return this.traced("native", saleIndex, buyer, () => {
      const { runtime, self } = this.deps;
      const value = parseAmount(nativeSent, "nativeSent");
      const sale = this.activeSale(saleIndex);
      if (value === 0n) throw new ValidationError("Native payment must be greater than zero");

      // Attach the payment; the journal returns it if anything below throws.
      if (!runtime.transferNative(buyer, self, value)) {
        throw new TransferFailureError(`${buyer} cannot fund ${value} of native currency`);
      }

      const { amountToBuy } = this.quoteNativeFor(sale, value);
      if (amountToBuy === 0n) throw new ValidationError("Native payment is too small to buy any units");

      this.requireCapacity(sale, amountToBuy);

      const treasury = this.deps.treasury();
      if (!runtime.transferNative(self, treasury, value)) {
        throw new TransferFailureError(`Forwarding ${value} of native currency to ${treasury} failed`);
      }

      return this.settle(sale, buyer, amountToBuy, 0n, value, referralCode);
    });
  }

  quoteStable(saleIndex: number, amountToBuy: bigint): bigint {
    const sale = this.deps.registry.get(saleIndex);
    return stableCost(parseAmount(amountToBuy, "amountToBuy"), sale.priceInUsd);
  }

  quoteNative(saleIndex: number, nativeSent: bigint): NativeQuote {
    const sale = this.deps.registry.get(saleIndex);
    return this.quoteNativeFor(sale, parseAmount(nativeSent, "nativeSent"));
  }

  // ── Steps ───────────────────────────────────────────────────────────

  private acceptedStablecoin(payToken: Address): Address {
    const token = toAddress(payToken, "payment token");
    if (isZeroAddress(token)) throw new ValidationError("Payment token is not configured");

    const { A, B } = this.deps.stablecoins();
    const accepted = [A, B].filter((slot) => !isZeroAddress(slot));
    if (!accepted.some((slot) => sameAddress(slot, token))) {
      throw new ValidationError(`${token} is not an accepted stablecoin`);
    }
    return token;
  }

  private activeSale(saleIndex: number): Sale {
    const sale = this.deps.registry.get(saleIndex);
    const reason = inactiveReason(sale, this.deps.runtime.now());
    if (reason) throw new StateError(`Sale ${saleIndex} is not active (${reason})`);
    return sale;
  }

  private requireCapacity(sale: Sale, amount: bigint): void {
    const remaining = remainingCapacity(sale.maxTokensToSell, sale.tokensSold);
    if (remaining !== undefined && amount > remaining) {
      throw new CapacityExceededError(amount, remaining);
    }
  }

  private readAllowance(token: Address, buyer: Address): bigint {
    try {
      return this.deps.runtime.token(token).allowance(buyer, this.deps.self);
    } catch (err) {
      if (isSaleDeskError(err)) throw err;
      throw new TransferFailureError(`Reading allowance on ${token} failed`, { cause: err });
    }
  }

  private quoteNativeFor(sale: Sale, nativeSent: bigint): NativeQuote {
    const rate = this.deps.oracle.latestUsdPerNative();
    return nativeQuote(nativeSent, rate, sale.priceInUsd);
  }

  private settle(
    sale: Sale,
    buyer: Address,
    amountBought: bigint,
    usdCost: bigint,
    nativeSent: bigint,
    referralCode: string
  ): TokensBought {
    disburse(this.deps.runtime, this.deps.self, sale, buyer, amountBought);
    this.deps.registry.recordSold(sale.index, amountBought);

    const receipt: TokensBought = {
      buyer,
      index: sale.index,
      amountBought,
      priceInUsd: sale.priceInUsd,
      usdCost,
      nativeSent,
      referralCode,
    };
    this.deps.emit({ type: "TokensBought", ...receipt });
    return receipt;
  }

  private traced(kind: "stable" | "native", saleIndex: number, buyer: Address, work: () => TokensBought): TokensBought {
    try {
      const receipt = work();
      this.logger.info(
        { kind, index: saleIndex, buyer, amount: receipt.amountBought.toString() },
        "Tokens bought"
      );
      return receipt;
    } catch (err) {
      this.logger.debug({ kind, index: saleIndex, buyer, err }, "Purchase rejected");
      throw err;
    }
  }
}
