import type { ArgumentsCamelCase, Argv } from "yargs";
import { describeDisbursement } from "../../../core/src";
import { apiRequest, formatDate, formatUnits, formatUsd, readSale, withGlobals, type GlobalArgs } from "../config";

export const command = "status";
export const describe = "Display one sale's configuration and progress";

interface StatusArgs extends GlobalArgs {
  index: number;
}

export function builder(yargs: Argv) {
  return withGlobals(yargs).option("index", {
    alias: "i",
    type: "number",
    demandOption: true,
    description: "Sale index",
  });
}

export async function handler(argv: ArgumentsCamelCase<StatusArgs>) {
  const sale = readSale(await apiRequest(argv, "GET", `/api/sales/${argv.index}`));
  const remaining = sale.maxTokensToSell === 0n ? "unbounded" : formatUnits(sale.maxTokensToSell - sale.tokensSold);

  console.log(`\n=== Sale #${sale.index} ===`);
  console.log(`  Asset:        ${sale.assetAddress}`);
  console.log(`  Disbursement: ${describeDisbursement(sale.method)}`);
  if (sale.source) {
    console.log(`  Source:       ${sale.source}`);
  }
  console.log(`  Price:        ${formatUsd(sale.priceInUsd)}`);
  console.log(`  Sold:         ${formatUnits(sale.tokensSold)}`);
  console.log(`  Remaining:    ${remaining}`);
  console.log(`  Starts:       ${formatDate(sale.startDate)}`);
  console.log(`  Ends:         ${formatDate(sale.endDate)}`);
  console.log(`  Paused:       ${sale.paused}`);
  console.log(`  Active now:   ${sale.active}`);
}
