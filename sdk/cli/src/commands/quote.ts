import type { ArgumentsCamelCase, Argv } from "yargs";
import {
  ASSET_DECIMALS,
  ORACLE_DECIMALS,
  USD_DECIMALS,
  nativeQuote,
  parseDecimal,
  stableCost,
} from "../../../core/src";
import { formatUnits, formatUsd, withGlobals, type GlobalArgs } from "../config";

export const command = "quote";
export const describe = "Price a purchase offline, without contacting the backend";

interface QuoteArgs extends GlobalArgs {
  price: string;
  amount?: string;
  native?: string;
  rate?: string;
}

export function builder(yargs: Argv) {
  return withGlobals(yargs)
    .option("price", { type: "string", demandOption: true, description: "Unit price in USD, e.g. 1.50" })
    .option("amount", { type: "string", description: "Units to buy, e.g. 100" })
    .option("native", { type: "string", description: "Native currency to spend, e.g. 0.1" })
    .option("rate", { type: "string", description: "USD per native unit, e.g. 2000" })
    .conflicts("amount", "native")
    .check((argv) => {
      if (argv.amount === undefined && argv.native === undefined) throw new Error("Pass --amount or --native");
      if (argv.native !== undefined && argv.rate === undefined) throw new Error("--native needs --rate");
      return true;
    });
}

export type OfflineQuote =
  | { kind: "stable"; amountToBuy: bigint; usdCost: bigint }
  | { kind: "native"; nativeSent: bigint; usdValue: bigint; amountToBuy: bigint };

/** Same arithmetic the desk runs, fed from human-readable decimals. */
export function quoteOffline(args: Pick<QuoteArgs, "price" | "amount" | "native" | "rate">): OfflineQuote {
  const price = parseDecimal(args.price, USD_DECIMALS, "price");

  if (args.amount !== undefined) {
    const amountToBuy = parseDecimal(args.amount, ASSET_DECIMALS, "amount");
    return { kind: "stable", amountToBuy, usdCost: stableCost(amountToBuy, price) };
  }
  if (args.native === undefined || args.rate === undefined) {
    throw new Error("Pass --amount, or --native with --rate");
  }
  if (price === 0n) throw new Error("Price must be greater than zero");

  const nativeSent = parseDecimal(args.native, ASSET_DECIMALS, "native");
  const rate = parseDecimal(args.rate, ORACLE_DECIMALS, "rate");
  const { usdValue, amountToBuy } = nativeQuote(nativeSent, rate, price);
  return { kind: "native", nativeSent, usdValue, amountToBuy };
}

export async function handler(argv: ArgumentsCamelCase<QuoteArgs>) {
  const quote = quoteOffline(argv);

  console.log(`\n=== Quote at ${formatUsd(parseDecimal(argv.price, USD_DECIMALS))} per unit ===`);
  if (quote.kind === "stable") {
    console.log(`  Units:    ${formatUnits(quote.amountToBuy)}`);
    console.log(`  Cost:     ${formatUsd(quote.usdCost)}`);
  } else {
    console.log(`  Paying:   ${formatUnits(quote.nativeSent)} native`);
    console.log(`  Worth:    $${formatUnits(quote.usdValue)}`);
    console.log(`  Units:    ${formatUnits(quote.amountToBuy)}`);
  }
}
