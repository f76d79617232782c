export * from "./classifier";
export * from "./formatSignal";
