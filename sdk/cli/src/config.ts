import type { Argv } from "yargs";
import {
  ASSET_DECIMALS,
  DISBURSEMENT_METHODS,
  USD_DECIMALS,
  formatDecimal,
  type DisbursementMethod,
} from "../../core/src";

export const DEFAULT_API_URL = "http://localhost:3001";

export const globalOptions = {
  "api-url": {
    alias: "u",
    type: "string",
    description: "SaleDesk backend URL",
    default: process.env.SALEDESK_API_URL || DEFAULT_API_URL,
  },
  "api-key": {
    alias: "k",
    type: "string",
    description: "API key sent as x-api-key",
    default: process.env.SALEDESK_API_KEY || "dev-api-key",
  },
  caller: {
    alias: "c",
    type: "string",
    description: "Address to act as (defaults to SALEDESK_CALLER)",
  },
} as const;

export interface GlobalArgs {
  apiUrl: string;
  apiKey: string;
  caller?: string;
}

/** Every command re-declares the globals so its handler sees them typed. */
export function withGlobals(yargs: Argv) {
  return yargs.options(globalOptions);
}

// ── HTTP client ───────────────────────────────────────────────────────

export class ApiError extends Error {
  constructor(
    readonly status: number,
    readonly code: string | undefined,
    message: string
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function callerOf(args: GlobalArgs): string | undefined {
  return args.caller || process.env.SALEDESK_CALLER || undefined;
}

export async function apiRequest(
  args: GlobalArgs,
  method: "GET" | "POST" | "PATCH" | "PUT" | "DELETE",
  path: string,
  body?: unknown
): Promise<unknown> {
  const headers: Record<string, string> = {
    "Content-Type": "application/json",
    "x-api-key": args.apiKey,
  };
  const caller = callerOf(args);
  if (caller) headers["x-caller-address"] = caller;

  const res = await fetch(`${args.apiUrl.replace(/\/$/, "")}${path}`, {
    method,
    headers,
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  const payload: unknown = await res.json();

  if (!res.ok) {
    const message = isRecord(payload) && typeof payload.error === "string" ? payload.error : res.statusText;
    const code = isRecord(payload) && typeof payload.code === "string" ? payload.code : undefined;
    throw new ApiError(res.status, code, message);
  }
  return payload;
}

// ── Response readers ──────────────────────────────────────────────────

export interface SaleView {
  index: number;
  assetAddress: string;
  method: DisbursementMethod;
  source?: string;
  priceInUsd: bigint;
  maxTokensToSell: bigint;
  tokensSold: bigint;
  startDate: number;
  endDate: number;
  paused: boolean;
  active: boolean;
}

function unexpected(what: string): Error {
  return new Error(`Unexpected response from backend: ${what}`);
}

export function readString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  if (typeof value !== "string") throw unexpected(`${key} is not a string`);
  return value;
}

export function readNumber(record: Record<string, unknown>, key: string): number {
  const value = record[key];
  if (typeof value !== "number") throw unexpected(`${key} is not a number`);
  return value;
}

/** Amounts travel as decimal strings. */
export function readAmount(record: Record<string, unknown>, key: string): bigint {
  const value = readString(record, key);
  if (!/^\d+$/.test(value)) throw unexpected(`${key} is not an integer string`);
  return BigInt(value);
}

function readBoolean(record: Record<string, unknown>, key: string): boolean {
  const value = record[key];
  if (typeof value !== "boolean") throw unexpected(`${key} is not a boolean`);
  return value;
}

export function readSale(value: unknown): SaleView {
  if (!isRecord(value) || !isRecord(value.disbursement)) throw unexpected("sale is not an object");
  const method = value.disbursement.method;
  const known = DISBURSEMENT_METHODS.find((m) => m === method);
  if (!known) throw unexpected(`unknown disbursement method ${String(method)}`);

  return {
    index: readNumber(value, "index"),
    assetAddress: readString(value, "assetAddress"),
    method: known,
    source: known === "transferFrom" ? readString(value.disbursement, "source") : undefined,
    priceInUsd: readAmount(value, "priceInUsd"),
    maxTokensToSell: readAmount(value, "maxTokensToSell"),
    tokensSold: readAmount(value, "tokensSold"),
    startDate: readNumber(value, "startDate"),
    endDate: readNumber(value, "endDate"),
    paused: readBoolean(value, "paused"),
    active: readBoolean(value, "active"),
  };
}

export function readSales(value: unknown): SaleView[] {
  if (!isRecord(value) || !Array.isArray(value.sales)) throw unexpected("sales list missing");
  return value.sales.map(readSale);
}

// ── Formatting ────────────────────────────────────────────────────────

export function formatUsd(value: bigint): string {
  return `$${formatDecimal(value, USD_DECIMALS)}`;
}

export function formatUnits(value: bigint): string {
  return formatDecimal(value, ASSET_DECIMALS);
}

export function formatDate(seconds: number): string {
  return seconds === 0 ? "(none)" : new Date(seconds * 1000).toISOString();
}
