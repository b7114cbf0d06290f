import { TransferFailureError, isSaleDeskError } from "./errors";
import type { Address, Disbursement, DisbursementMethod, Sale, SaleRuntime } from "./types";
import { assertNever } from "./utils";

/**
 * Run a call into collaborator code. A `false` result or a foreign exception
 * becomes a TransferFailureError; our own errors (a re-entrant call rejected
 * by the lock, say) pass through untouched.
 */
export function callExternal(action: string, call: () => boolean): void {
  let ok: boolean;
  try {
    ok = call();
  } catch (err) {
    if (isSaleDeskError(err)) throw err;
    throw new TransferFailureError(`${action} reverted`, { cause: err });
  }
  if (!ok) throw new TransferFailureError(`${action} failed`);
}

/** Address the asset is paid out of for a given disbursement. */
export function disbursementSource(
  disbursement: Disbursement,
  assetAddress: Address,
  self: Address
): Address {
  switch (disbursement.method) {
    case "transfer":
      return self;
    case "transferFrom":
      return disbursement.source;
    case "mint":
      return assetAddress;
    default:
      return assertNever(disbursement);
  }
}

export function describeDisbursement(method: DisbursementMethod): string {
  switch (method) {
    case "transfer":
      return "Transfer from sale custody";
    case "transferFrom":
      return "TransferFrom an approved holder";
    case "mint":
      return "Mint on purchase";
    default:
      return assertNever(method);
  }
}

/**
 * Moves `amount` of the sale asset to `buyer` using the sale's configured
 * method.
 */
export function disburse(
  runtime: SaleRuntime,
  self: Address,
  sale: Sale,
  buyer: Address,
  amount: bigint
): void {
  const { disbursement } = sale;

  switch (disbursement.method) {
    case "transfer": {
      callExternal("Asset transfer", () => {
        const asset = runtime.token(sale.assetAddress);
        const custody = asset.balanceOf(self);
        if (custody < amount) {
          throw new TransferFailureError(`Sale custody holds ${custody}, ${amount} needed`);
        }
        return asset.transfer(self, buyer, amount);
      });
      return;
    }
    case "transferFrom": {
      callExternal("Asset transferFrom", () =>
        runtime.token(sale.assetAddress).transferFrom(self, disbursement.source, buyer, amount)
      );
      return;
    }
    case "mint": {
      callExternal("Asset mint", () =>
        runtime.minter(sale.assetAddress).mint(self, buyer, amount)
      );
      return;
    }
    default:
      assertNever(disbursement);
  }
}
