export * from "./types";
export * from "./errors";
export * from "./utils";
export * from "./presets";
export * from "./pricing";
export { isActive, inactiveReason, type InactiveReason } from "./guard";
export { Journal } from "./journal";
export { ReentrancyLock } from "./lock";
export { createLogger, type Logger } from "./logger";
export { PriceOracleAdapter, type PriceOracleOptions } from "./oracle";
export { disburse, disbursementSource, describeDisbursement } from "./disbursement";
export { SaleRegistry, normalizeDisbursement } from "./registry";
export { PurchaseEngine } from "./purchase";
export { AccessControl } from "./access-control";
export { SaleDesk, type SaleDeskOptions } from "./sale-desk";
export { LocalChain, LocalToken, LocalPriceFeed, type LocalChainOptions, type LocalTokenOptions } from "./local-chain";
