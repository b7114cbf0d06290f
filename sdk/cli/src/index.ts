#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { ApiError, globalOptions } from "./config";

import * as quote from "./commands/quote";
import * as sales from "./commands/sales";
import * as status from "./commands/status";
import * as buy from "./commands/buy";
import * as pause from "./commands/pause";
import * as events from "./commands/events";

yargs(hideBin(process.argv))
  .scriptName("saledesk")
  .usage("$0 <command> [options]")
  .options(globalOptions)
  .command(quote)
  .command(sales)
  .command(status)
  .command(buy)
  .command(pause)
  .command(events)
  .demandCommand(1, "Specify a command to run")
  .strict()
  .fail((msg, err, cli) => {
    if (err instanceof ApiError) {
      console.error(`Error ${err.status}${err.code ? ` ${err.code}` : ""}: ${err.message}`);
    } else if (err) {
      console.error(`Error: ${err.message}`);
    } else {
      cli.showHelp();
      console.error(`\n${msg}`);
    }
    process.exit(1);
  })
  .help()
  .parseAsync()
  .catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
