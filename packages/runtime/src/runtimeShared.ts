import { createLogger } from "@rsiwatch/core";

export const runtimeLogger = createLogger("runtime");

/** Latest candle older than this many bars is logged as stale. */
export const STALE_BAR_THRESHOLD = 2;
