import type { ArgumentsCamelCase, Argv } from "yargs";
import { ASSET_DECIMALS, parseDecimal } from "../../../core/src";
import {
  apiRequest,
  formatUnits,
  formatUsd,
  isRecord,
  readAmount,
  withGlobals,
  type GlobalArgs,
} from "../config";

export const command = "buy";
export const describe = "Buy from a sale as the --caller address";

const PAYMENTS = ["A", "B", "native"] as const;

interface BuyArgs extends GlobalArgs {
  index: number;
  payment: (typeof PAYMENTS)[number];
  amount: string;
  referral: string;
}

export function builder(yargs: Argv) {
  return withGlobals(yargs)
    .option("index", { alias: "i", type: "number", demandOption: true, description: "Sale index" })
    .option("payment", {
      alias: "p",
      choices: PAYMENTS,
      demandOption: true,
      description: "Stablecoin slot A or B, or native currency",
    })
    .option("amount", {
      alias: "a",
      type: "string",
      demandOption: true,
      description: "Units to buy (stablecoins) or native currency to spend, as a decimal",
    })
    .option("referral", { alias: "r", type: "string", default: "", description: "Referral code" });
}

/** Request body for the purchase endpoint; decimals become 18-decimal base units. */
export function purchaseBody(args: Pick<BuyArgs, "payment" | "amount" | "referral">) {
  const baseUnits = parseDecimal(args.amount, ASSET_DECIMALS).toString();
  return args.payment === "native"
    ? { payment: args.payment, nativeSent: baseUnits, referralCode: args.referral }
    : { payment: args.payment, amount: baseUnits, referralCode: args.referral };
}

export async function handler(argv: ArgumentsCamelCase<BuyArgs>) {
  const receipt = await apiRequest(argv, "POST", `/api/sales/${argv.index}/purchases`, purchaseBody(argv));
  if (!isRecord(receipt)) throw new Error("Unexpected response from backend: receipt is not an object");

  console.log(`\nPurchase confirmed on sale #${argv.index}!`);
  console.log(`  Bought:  ${formatUnits(readAmount(receipt, "amountBought"))}`);
  if (argv.payment === "native") {
    console.log(`  Paid:    ${formatUnits(readAmount(receipt, "nativeSent"))} native`);
  } else {
    console.log(`  Paid:    ${formatUsd(readAmount(receipt, "usdCost"))} in stablecoin ${argv.payment}`);
  }
  if (argv.referral) {
    console.log(`  Referral: ${argv.referral}`);
  }
}
