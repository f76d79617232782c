export * from "./rollingWindow";
export * from "./sma";
export * from "./rsi";
