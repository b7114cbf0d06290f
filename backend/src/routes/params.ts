import type { Request } from "express";
import {
  DISBURSEMENT_METHODS,
  ValidationError,
  assertNever,
  parseAmount,
  parseTimestamp,
  toAddress,
  type Address,
  type Disbursement,
  type DisbursementMethod,
  type StableSlot,
} from "../../../sdk/core/src";

type Body = Record<string, unknown>;

function isRecord(value: unknown): value is Body {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readBody(req: Request): Body {
  return isRecord(req.body) ? req.body : {};
}

/** Acting identity for mutating calls. */
export function callerOf(req: Request): Address {
  const caller = req.get("x-caller-address");
  if (!caller) throw new ValidationError("x-caller-address header is required");
  return toAddress(caller, "caller address");
}

export function parseIndex(raw: string, label = "sale index"): number {
  if (!/^\d+$/.test(raw)) throw new ValidationError(`Invalid ${label}: ${raw}`);
  return Number(raw);
}

export function parseSlot(raw: string): StableSlot {
  if (raw === "A" || raw === "B") return raw;
  throw new ValidationError(`Unknown stablecoin slot: ${raw}`);
}

export function optionalString(body: Body, key: string): string | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") throw new ValidationError(`${key} must be a string`);
  return value;
}

export function requireString(body: Body, key: string): string {
  const value = optionalString(body, key);
  if (value === undefined) throw new ValidationError(`${key} is required`);
  return value;
}

export function requireAddress(body: Body, key: string): Address {
  return toAddress(requireString(body, key), key);
}

/** Base-unit integer given as a decimal string (or a safe integer). */
export function optionalAmount(body: Body, key: string): bigint | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string" && /^\d+$/.test(value)) return parseAmount(value, key);
  if (typeof value === "number" && Number.isSafeInteger(value)) return parseAmount(value, key);
  throw new ValidationError(`${key} must be a non-negative integer string`);
}

export function requireAmount(body: Body, key: string): bigint {
  const value = optionalAmount(body, key);
  if (value === undefined) throw new ValidationError(`${key} is required`);
  return value;
}

export function optionalTimestamp(body: Body, key: string): number | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number") throw new ValidationError(`${key} must be a number`);
  return parseTimestamp(value, key);
}

export function optionalBoolean(body: Body, key: string): boolean | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") throw new ValidationError(`${key} must be a boolean`);
  return value;
}

function isDisbursementMethod(value: unknown): value is DisbursementMethod {
  return DISBURSEMENT_METHODS.some((method) => method === value);
}

/** `{ method, source? }`; defaults to custody transfer. */
export function parseDisbursement(value: unknown): Disbursement {
  if (value === undefined || value === null) return { method: "transfer" };
  const method = isRecord(value) ? value.method : undefined;
  if (!isRecord(value) || !isDisbursementMethod(method)) {
    throw new ValidationError(`disbursement.method must be one of ${DISBURSEMENT_METHODS.join(", ")}`);
  }
  switch (method) {
    case "transfer":
      return { method: "transfer" };
    case "mint":
      return { method: "mint" };
    case "transferFrom":
      return { method: "transferFrom", source: requireAddress(value, "source") };
    default:
      return assertNever(method);
  }
}

/** Query-string integer, or undefined when absent. */
export function queryInt(value: unknown, key: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string" || !/^\d+$/.test(value)) {
    throw new ValidationError(`${key} must be a non-negative integer`);
  }
  return Number(value);
}

export function queryString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}
