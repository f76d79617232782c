export * from "./ccxtMapper";
export * from "./binanceClient";
