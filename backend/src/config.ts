import path from "path";
import { parseAmount, toAddress, type Address } from "../../sdk/core/src";

export interface BackendConfig {
  port: number;
  apiKey: string;
  dbPath: string;
  logLevel: string;
  logPretty: boolean;
  /** Administrator of the hosted desk; a fresh local account when unset. */
  ownerAddress?: Address;
  /** Initial answer of the dev price feed, 8 decimals. */
  nativeUsdPrice: bigint;
  /** Seconds before an oracle answer counts as stale; 0 disables. */
  oracleMaxAge: number;
  /** Accounts credited with stablecoins and native currency at boot. */
  fundAccounts: Address[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BackendConfig {
  return {
    port: Number(env.PORT) || 3001,
    apiKey: env.API_KEY || "dev-api-key",
    dbPath: env.DB_PATH || path.join(process.cwd(), "data", "saledesk.sqlite"),
    logLevel: env.LOG_LEVEL || "info",
    logPretty: env.LOG_PRETTY === "true",
    ownerAddress: env.OWNER_ADDRESS ? toAddress(env.OWNER_ADDRESS, "OWNER_ADDRESS") : undefined,
    nativeUsdPrice: parseAmount(env.NATIVE_USD_PRICE || "200000000000", "NATIVE_USD_PRICE"),
    oracleMaxAge: Number(env.ORACLE_MAX_AGE) || 0,
    fundAccounts: (env.FUND_ACCOUNTS || "")
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0)
      .map((entry) => toAddress(entry, "FUND_ACCOUNTS entry")),
  };
}
