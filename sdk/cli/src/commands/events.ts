import type { ArgumentsCamelCase, Argv } from "yargs";
import { apiRequest, isRecord, readNumber, readString, withGlobals, type GlobalArgs } from "../config";

export const command = "events";
export const describe = "Show recorded sale notifications, newest first";

interface EventsArgs extends GlobalArgs {
  type?: string;
  sale?: number;
  limit: number;
}

export function builder(yargs: Argv) {
  return withGlobals(yargs)
    .option("type", { alias: "t", type: "string", description: "Only this event type, e.g. TokensBought" })
    .option("sale", { alias: "s", type: "number", description: "Only events of this sale" })
    .option("limit", { alias: "l", type: "number", default: 20, description: "Maximum number of events" });
}

export function eventsPath(args: Pick<EventsArgs, "type" | "sale" | "limit">): string {
  const query = new URLSearchParams({ limit: String(args.limit) });
  if (args.type) query.set("type", args.type);
  if (args.sale !== undefined) query.set("sale", String(args.sale));
  return `/api/events?${query.toString()}`;
}

export async function handler(argv: ArgumentsCamelCase<EventsArgs>) {
  const payload = await apiRequest(argv, "GET", eventsPath(argv));
  const events = isRecord(payload) && Array.isArray(payload.events) ? payload.events : [];

  if (events.length === 0) {
    console.log("No events recorded.");
    return;
  }

  for (const event of events) {
    if (!isRecord(event)) continue;
    const when = new Date(readNumber(event, "timestamp") * 1000).toISOString();
    const sale = typeof event.sale === "number" ? ` sale #${event.sale}` : "";
    console.log(`  ${when}  ${readString(event, "type")}${sale}`);
    console.log(`    ${JSON.stringify(event.data)}`);
  }
}
