import type { ArgumentsCamelCase, Argv } from "yargs";
import { apiRequest, readSale, withGlobals, type GlobalArgs } from "../config";

export const command = "pause";
export const describe = "Pause or unpause a sale (administrator only)";

interface PauseArgs extends GlobalArgs {
  index: number;
  unpause: boolean;
}

export function builder(yargs: Argv) {
  return withGlobals(yargs)
    .option("index", { alias: "i", type: "number", demandOption: true, description: "Sale index" })
    .option("unpause", { type: "boolean", default: false, description: "Unpause instead of pause" });
}

export async function handler(argv: ArgumentsCamelCase<PauseArgs>) {
  const sale = readSale(
    await apiRequest(argv, "PATCH", `/api/sales/${argv.index}`, { paused: !argv.unpause })
  );

  console.log(`\nSale #${sale.index} ${sale.paused ? "paused" : "unpaused"}.`);
  console.log(`  Active now: ${sale.active}`);
}
