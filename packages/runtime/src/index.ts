export * from "./loop/runCycle";
export * from "./monitor/RsiMonitor";
export * from "./notify/notificationSink";
export { runtimeLogger } from "./runtimeShared";
