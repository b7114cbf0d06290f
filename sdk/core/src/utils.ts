import { ethers } from "ethers";
import { ValidationError } from "./errors";
import type { Address } from "./types";

export const ZERO_ADDRESS: Address = ethers.constants.AddressZero;

/** Normalize to an EIP-55 checksummed address; rejects anything else. */
export function toAddress(value: string, label = "address"): Address {
  try {
    return ethers.utils.getAddress(value);
  } catch (err) {
    throw new ValidationError(`Invalid ${label}: ${value}`, { cause: err });
  }
}

export function isZeroAddress(address: Address): boolean {
  return address === ZERO_ADDRESS;
}

export function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

/** Parse a non-negative integer amount given in base units. */
export function parseAmount(value: string | number | bigint, label = "amount"): bigint {
  let parsed: bigint;
  try {
    parsed = BigInt(value);
  } catch (err) {
    throw new ValidationError(`Invalid ${label}: ${String(value)}`, { cause: err });
  }
  if (parsed < 0n) throw new ValidationError(`${label} must not be negative`);
  return parsed;
}

/** Parse a decimal string such as "1.5" into base units. */
export function parseDecimal(value: string, decimals: number, label = "amount"): bigint {
  try {
    return ethers.utils.parseUnits(value, decimals).toBigInt();
  } catch (err) {
    throw new ValidationError(`Invalid ${label}: ${value}`, { cause: err });
  }
}

export function formatDecimal(value: bigint, decimals: number): string {
  return ethers.utils.formatUnits(value, decimals);
}

/** Unix seconds; 0 means "no bound". */
export function parseTimestamp(value: number, label = "timestamp"): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(`Invalid ${label}: ${value}`);
  }
  return value;
}

/** `JSON.stringify` replacer that writes bigints as decimal strings. */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected variant: ${JSON.stringify(value)}`);
}
