import type { Sale } from "./types";

export type InactiveReason = "paused" | "not-started" | "ended";

type Window = Pick<Sale, "paused" | "startDate" | "endDate">;

export function inactiveReason(sale: Window, now: number): InactiveReason | undefined {
  if (sale.paused) return "paused";
  if (sale.startDate !== 0 && now < sale.startDate) return "not-started";
  if (sale.endDate !== 0 && now >= sale.endDate) return "ended";
  return undefined;
}

/** Start is inclusive, end exclusive; a zero bound is open. */
export function isActive(sale: Window, now: number): boolean {
  return inactiveReason(sale, now) === undefined;
}
