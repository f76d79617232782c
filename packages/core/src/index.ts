/**
 * Shared contracts, configuration and logging for every rsi-watch package.
 */
export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./exchange";
export * from "./utils/logger";
export * from "./utils/priceSeries";
