import type { Logger } from "pino";
import type { AccessControl } from "./access-control";
import { disbursementSource } from "./disbursement";
import { CapacityExceededError, NotFoundError, ValidationError } from "./errors";
import type { Journal } from "./journal";
import type {
  Address,
  CreateSaleParams,
  Disbursement,
  Emit,
  Sale,
  SaleRecordFields,
} from "./types";
import { isZeroAddress, parseAmount, parseTimestamp, toAddress } from "./utils";

export interface SaleRegistryDeps {
  journal: Journal;
  access: AccessControl;
  emit: Emit;
  /** Address of the sale system itself (custody for transfer sales). */
  self: Address;
  logger: Logger;
}

type MutableField = "priceInUsd" | "maxTokensToSell" | "startDate" | "endDate" | "assetAddress" | "paused";

/**
 * Append-only arena of sales. Indices are positions in the arena and are
 * never reused; there is no removal.
 */
export class SaleRegistry {
  private readonly sales: Sale[] = [];
  private readonly logger: Logger;

  constructor(private readonly deps: SaleRegistryDeps) {
    this.logger = deps.logger.child({ module: "registry" });
  }

  get length(): number {
    return this.sales.length;
  }

  create(caller: Address, params: CreateSaleParams): number {
    this.deps.access.requireOwner(caller);

    const sale: Sale = {
      index: this.sales.length,
      assetAddress: requireAsset(params.assetAddress),
      disbursement: normalizeDisbursement(params.disbursement),
      priceInUsd: requirePrice(params.priceInUsd),
      maxTokensToSell: parseAmount(params.maxTokensToSell, "maxTokensToSell"),
      tokensSold: 0n,
      startDate: parseTimestamp(params.startDate, "startDate"),
      endDate: parseTimestamp(params.endDate, "endDate"),
      paused: params.paused,
    };

    this.sales.push(sale);
    this.deps.journal.record(() => {
      this.sales.pop();
    });

    this.logger.info({ index: sale.index, method: sale.disbursement.method }, "Sale created");
    this.deps.emit({ type: "SaleCreated", ...this.recordFields(sale) });
    return sale.index;
  }

  get(index: number): Sale {
    return snapshot(this.entry(index));
  }

  list(): Sale[] {
    return this.sales.map(snapshot);
  }

  setPrice(caller: Address, index: number, value: bigint): Sale {
    this.deps.access.requireOwner(caller);
    return this.update(index, "priceInUsd", requirePrice(value));
  }

  setMaxTokens(caller: Address, index: number, value: bigint): Sale {
    this.deps.access.requireOwner(caller);
    const max = parseAmount(value, "maxTokensToSell");
    const { tokensSold } = this.entry(index);
    if (max !== 0n && max < tokensSold) {
      throw new ValidationError(`Cap ${max} is below the ${tokensSold} already sold`);
    }
    return this.update(index, "maxTokensToSell", max);
  }

  setStartDate(caller: Address, index: number, value: number): Sale {
    this.deps.access.requireOwner(caller);
    return this.update(index, "startDate", parseTimestamp(value, "startDate"));
  }

  setEndDate(caller: Address, index: number, value: number): Sale {
    this.deps.access.requireOwner(caller);
    return this.update(index, "endDate", parseTimestamp(value, "endDate"));
  }

  setAssetAddress(caller: Address, index: number, value: Address): Sale {
    this.deps.access.requireOwner(caller);
    return this.update(index, "assetAddress", requireAsset(value));
  }

  setPaused(caller: Address, index: number, value: boolean): Sale {
    this.deps.access.requireOwner(caller);
    return this.update(index, "paused", value);
  }

  /** Bookkeeping for the purchase path only; not reachable from the admin surface. */
  recordSold(index: number, amount: bigint): void {
    const sale = this.entry(index);
    const next = sale.tokensSold + amount;
    if (sale.maxTokensToSell !== 0n && next > sale.maxTokensToSell) {
      throw new CapacityExceededError(amount, sale.maxTokensToSell - sale.tokensSold);
    }
    const previous = sale.tokensSold;
    this.deps.journal.record(() => {
      sale.tokensSold = previous;
    });
    sale.tokensSold = next;
  }

  recordFields(sale: Sale): SaleRecordFields {
    return {
      index: sale.index,
      assetAddress: sale.assetAddress,
      priceInUsd: sale.priceInUsd,
      maxTokensToSell: sale.maxTokensToSell,
      startDate: sale.startDate,
      endDate: sale.endDate,
      paused: sale.paused,
      disbursementMethod: sale.disbursement.method,
      sourceAddress: disbursementSource(sale.disbursement, sale.assetAddress, this.deps.self),
    };
  }

  /** Callers have already passed `requireOwner`. */
  private update<K extends MutableField>(index: number, field: K, value: Sale[K]): Sale {
    const sale = this.entry(index);

    const previous = sale[field];
    this.deps.journal.record(() => {
      sale[field] = previous;
    });
    sale[field] = value;

    this.logger.info({ index, field, value: String(value) }, "Sale updated");
    this.deps.emit({ type: "SaleUpdated", ...this.recordFields(sale) });
    return snapshot(sale);
  }

  private entry(index: number): Sale {
    const sale = Number.isSafeInteger(index) ? this.sales[index] : undefined;
    if (!sale) throw new NotFoundError(`Sale ${index} does not exist`);
    return sale;
  }
}

function snapshot(sale: Sale): Sale {
  return Object.freeze({ ...sale, disbursement: Object.freeze({ ...sale.disbursement }) });
}

function requirePrice(value: bigint): bigint {
  const price = parseAmount(value, "priceInUsd");
  if (price === 0n) throw new ValidationError("priceInUsd must be greater than zero");
  return price;
}

function requireAsset(value: Address): Address {
  const address = toAddress(value, "assetAddress");
  if (isZeroAddress(address)) throw new ValidationError("assetAddress cannot be the zero address");
  return address;
}

/**
 * Input may come from JSON or the CLI, so the tag is checked at run time too.
 */
export function normalizeDisbursement(input: Disbursement): Disbursement {
  switch (input.method) {
    case "transfer":
      return { method: "transfer" };
    case "mint":
      return { method: "mint" };
    case "transferFrom": {
      const source = toAddress(input.source, "disbursement source");
      if (isZeroAddress(source)) {
        throw new ValidationError("transferFrom disbursement needs a non-zero source address");
      }
      return { method: "transferFrom", source };
    }
    default:
      throw new ValidationError(`Unknown disbursement method: ${JSON.stringify(input)}`);
  }
}
