import type { ArgumentsCamelCase, Argv } from "yargs";
import { apiRequest, formatUnits, formatUsd, readSales, withGlobals, type GlobalArgs } from "../config";

export const command = "sales";
export const describe = "List every sale known to the backend";

export function builder(yargs: Argv) {
  return withGlobals(yargs);
}

export async function handler(argv: ArgumentsCamelCase<GlobalArgs>) {
  const sales = readSales(await apiRequest(argv, "GET", "/api/sales"));

  if (sales.length === 0) {
    console.log("No sales yet.");
    return;
  }

  console.log(`\n${sales.length} sale(s):`);
  for (const sale of sales) {
    const cap = sale.maxTokensToSell === 0n ? "unbounded" : formatUnits(sale.maxTokensToSell);
    const state = sale.paused ? "paused" : sale.active ? "active" : "inactive";
    console.log(
      `  #${sale.index}  ${formatUsd(sale.priceInUsd)}  sold ${formatUnits(sale.tokensSold)} / ${cap}  [${sale.method}, ${state}]`
    );
  }
}
