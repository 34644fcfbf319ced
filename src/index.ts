/**
 * bonding-curve-launchpad
 *
 * Exponential bonding-curve pricing, reserve accounting and AMM graduation
 * for token launches. All amounts are bigint u128 values.
 */

// Math
export * from "./constants";
export * from "./fixed-point";
export * from "./pricing";

// Model and errors
export * from "./types";
export * from "./errors";

// Curve engine
export * from "./state";
export * from "./ledger";
export * from "./lifecycle";
export * from "./lp-distribution";
export * from "./graduation";
export type { AmmGateway } from "./amm";

// Instances
export * from "./operations";
export * from "./contract";
export * from "./abi";
export * from "./factory";

export { loadConfig, type Config } from "./config";
export { logger } from "./logger";
